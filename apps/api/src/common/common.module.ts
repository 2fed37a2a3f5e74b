import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';

import { FirebaseAdminService } from '../firebase/firebase-admin.service';
import { Clock, SystemClock } from './clock';
import { LoggingInterceptor } from './logging.interceptor';
import { StoreFactory } from './persistence/store.factory';
import { RateLimitService } from './rate-limit.service';
import { SequenceLock } from './sequence-lock.service';

@Global()
@Module({
  providers: [
    RateLimitService,
    FirebaseAdminService,
    StoreFactory,
    SequenceLock,
    { provide: Clock, useClass: SystemClock },
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
  ],
  exports: [RateLimitService, FirebaseAdminService, StoreFactory, SequenceLock, Clock],
})
export class CommonModule {}
