import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { JwtModule } from '@nestjs/jwt';
import { AccessControlService } from './access-control.service';
import { CapabilityService } from './capability.service';
import { TokenService } from './token.service';
import { BootstrapAdminService } from './bootstrap-admin.service';
import { AuthController } from './auth.controller';
import { UserAccount } from './entities/user-account.entity';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([UserAccount]),
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        secret: configService.getOrThrow<string>('JWT_SECRET'),
      }),
    }),
    AuditModule,
  ],
  controllers: [AuthController],
  providers: [AccessControlService, CapabilityService, TokenService, BootstrapAdminService],
  exports: [AccessControlService, CapabilityService, TokenService],
})
export class AuthModule {}
