import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { AuditModule } from '../audit/audit.module';
import { AuthModule } from '../auth/auth.module';
import { ProductionOperationsService } from './production-operations.service';
import { OperationsController } from './operations.controller';

@Module({
  imports: [CatalogModule, AuditModule, AuthModule],
  controllers: [OperationsController],
  providers: [ProductionOperationsService],
  exports: [ProductionOperationsService],
})
export class OperationsModule {}
