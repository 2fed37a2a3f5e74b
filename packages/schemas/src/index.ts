import type { CsiDivision } from '@gcpanel/types';

import bimElementSchema from '../bim-element.schema.json';
import costItemSchema from '../cost-item.schema.json';
import csiDivisions from '../csi-divisions.json';
import rfiSchema from '../rfi.schema.json';

export type DocType = 'rfi' | 'bim-element' | 'cost-item';

export const SchemaCatalog: Record<DocType, unknown> = {
  rfi: rfiSchema,
  'bim-element': bimElementSchema,
  'cost-item': costItemSchema,
};

export function isDocType(value: string): value is DocType {
  return Object.prototype.hasOwnProperty.call(SchemaCatalog, value);
}

export function getSchema(docType: DocType) {
  return SchemaCatalog[docType];
}

// --- MasterFormat divisions used for budget coding ---

export const CSI_DIVISIONS: readonly CsiDivision[] = csiDivisions;

const divisionNames = new Map(CSI_DIVISIONS.map((d) => [d.code, d.name]));

export function csiDivisionName(code: string): string | undefined {
  return divisionNames.get(code);
}
