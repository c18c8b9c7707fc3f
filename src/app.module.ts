import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD, APP_FILTER } from '@nestjs/core';
import { DataSource } from 'typeorm';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { CapabilityGuard } from './auth/guards/capability.guard';
import { ENTITIES } from './database/entities';
import { ValidationModule } from './validation/validation.module';
import { AuditModule } from './audit/audit.module';
import { AuthModule } from './auth/auth.module';
import { CatalogModule } from './catalog/catalog.module';
import { MetricsModule } from './metrics/metrics.module';
import { OperationsModule } from './operations/operations.module';
import { AppController } from './app.controller';

// POSTGRES_URL wins over the discrete DB_* variables
export function getDatabaseConfig() {
  const shared = {
    type: 'postgres' as const,
    entities: ENTITIES,
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.NODE_ENV === 'development',
  };

  if (process.env.POSTGRES_URL) {
    return {
      ...shared,
      url: process.env.POSTGRES_URL,
      ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
      extra: {
        max: 10,
        connectionTimeoutMillis: 5000,
        idleTimeoutMillis: 30000,
      },
      retryAttempts: 3,
      retryDelay: 3000,
    };
  }

  return {
    ...shared,
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'user',
    password: process.env.DB_PASSWORD || 'password',
    database: process.env.DB_DATABASE || 'filmdb',
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../.env.local'],
    }),
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 1 minute
        limit: 100,
      },
    ]),
    TypeOrmModule.forRootAsync({
      useFactory: async () => getDatabaseConfig(),
      dataSourceFactory: async (options) => {
        if (!options) {
          throw new Error('Database configuration options are required');
        }
        return new DataSource(options).initialize();
      },
    }),
    ValidationModule,
    AuditModule,
    AuthModule, // accounts, roles and capabilities
    CatalogModule, // production records
    MetricsModule, // derived values and reports
    OperationsModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    // after throttling, so rejected floods never reach the account lookup
    {
      provide: APP_GUARD,
      useClass: CapabilityGuard,
    },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
  ],
})
export class AppModule {}
