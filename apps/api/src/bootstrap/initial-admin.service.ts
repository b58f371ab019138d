import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountsService } from '@gatehouse/auth';

/**
 * Creates the first admin account from INITIAL_ADMIN_USERNAME and
 * INITIAL_ADMIN_PASSWORD once the database is reachable.
 *
 * Without it nobody could ever reach the admin service: roles can only
 * be granted by an existing admin. Runs in the public API only, so two
 * services starting together do not race on the same insert.
 */
@Injectable()
export class InitialAdminService implements OnApplicationBootstrap {
  private readonly logger = new Logger(InitialAdminService.name);

  constructor(
    private readonly accountsService: AccountsService,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const username = this.configService.get<string>('INITIAL_ADMIN_USERNAME');
    const password = this.configService.get<string>('INITIAL_ADMIN_PASSWORD');

    if (!username || !password) {
      this.logger.log('No initial admin configured');
      return;
    }

    const created = await this.accountsService.ensureInitialAdmin(
      username,
      password,
    );
    if (created) {
      this.logger.log(`Initial admin "${username}" created`);
    }
  }
}
