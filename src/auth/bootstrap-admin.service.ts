import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccessControlService } from './access-control.service';

/**
 * Creates the first administrator on an empty user table so the system is
 * administrable after a fresh install. Skipped without BOOTSTRAP_ADMIN_PASSWORD.
 */
@Injectable()
export class BootstrapAdminService implements OnApplicationBootstrap {
  private readonly logger = new Logger(BootstrapAdminService.name);

  constructor(
    private configService: ConfigService,
    private accessControlService: AccessControlService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const password = this.configService.get<string>('BOOTSTRAP_ADMIN_PASSWORD');
    if (!password) {
      this.logger.log('BOOTSTRAP_ADMIN_PASSWORD not set, skipping bootstrap administrator');
      return;
    }

    const created = await this.accessControlService.ensureBootstrapAdmin({
      username: this.configService.get<string>('BOOTSTRAP_ADMIN_USERNAME') ?? 'admin',
      full_name: 'System Administrator',
      email: this.configService.get<string>('BOOTSTRAP_ADMIN_EMAIL') ?? 'admin@filmdb.local',
      password,
    });

    if (!created) {
      this.logger.log('User accounts already exist, bootstrap administrator not needed');
    }
  }
}
