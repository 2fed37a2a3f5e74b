import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { getSchema, isDocType } from '@gcpanel/schemas';

/** JSON Schemas for client-side form validation. Public: they carry no tenant data. */
@Controller('schemas')
export class SchemasController {
  @Get(':docType')
  getSchemaByType(@Param('docType') docType: string) {
    if (!isDocType(docType)) {
      throw new NotFoundException(`Unknown docType "${docType}"`);
    }
    return getSchema(docType);
  }
}
