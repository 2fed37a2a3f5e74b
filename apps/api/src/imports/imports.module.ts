import { Module } from '@nestjs/common';

import { StoreFactory } from '../common/persistence/store.factory';
import { FirebaseAdminService } from '../firebase/firebase-admin.service';
import {
  FALLBACK_IMPORT_REPOSITORY,
  FirestoreImportRepository,
  IMPORT_REPOSITORY,
  InMemoryImportRepository,
  type ImportRepository,
} from './import.repository';
import { ImportsController } from './imports.controller';
import { ImportsService } from './imports.service';

@Module({
  controllers: [ImportsController],
  providers: [
    {
      provide: IMPORT_REPOSITORY,
      inject: [StoreFactory, FirebaseAdminService],
      useFactory: (stores: StoreFactory, firebase: FirebaseAdminService): ImportRepository =>
        stores.driver === 'firestore' ? new FirestoreImportRepository(firebase) : new InMemoryImportRepository(),
    },
    { provide: FALLBACK_IMPORT_REPOSITORY, useClass: InMemoryImportRepository },
    ImportsService,
  ],
})
export class ImportsModule {}
