import { Injectable, Logger } from '@nestjs/common';
import * as admin from 'firebase-admin';

import { gcpProject } from '../common/config';

/**
 * Single point of Firebase Admin initialisation. Initialises lazily on first
 * use so that the in-memory driver never touches Google credentials.
 * Application Default Credentials are picked up when present.
 */
@Injectable()
export class FirebaseAdminService {
  private readonly logger = new Logger('FirebaseAdminService');
  private _firestore: admin.firestore.Firestore | null = null;

  private initialize(): admin.firestore.Firestore {
    if (admin.apps.length === 0) {
      const projectId = gcpProject();
      admin.initializeApp({ projectId });
      admin.firestore().settings({ ignoreUndefinedProperties: true });
      this.logger.log(`Firebase Admin initialized with project: ${projectId}`);
    }
    return admin.firestore();
  }

  get firestore(): admin.firestore.Firestore {
    if (!this._firestore) {
      this._firestore = this.initialize();
    }
    return this._firestore;
  }

  isInitialized(): boolean {
    return this._firestore !== null;
  }
}
