import { Module } from '@nestjs/common';
import { WriteGuardService } from './write-guard.service';

@Module({
  providers: [WriteGuardService],
  exports: [WriteGuardService],
})
export class ValidationModule {}
