import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { UserAccount, UserRole } from './entities/user-account.entity';
import { CapabilityService, Capability } from './capability.service';
import { TokenService, AuthTokens } from './token.service';
import { AuditService } from '../audit/audit.service';
import { AuthorizationException } from '../common/exceptions/authorization.exception';
import { InvariantViolationException } from '../common/exceptions/invariant-violation.exception';
import { RecordConflictException } from '../common/exceptions/record-conflict.exception';
import { RecordNotFoundException } from '../common/exceptions/record-not-found.exception';
import { inTransaction } from '../common/utils/transaction.util';
import { translateStoreError } from '../common/utils/store-error.util';

export const PASSWORD_HASH_ROUNDS = 10;

export type AuthenticationResult = 'AUTHORIZED' | 'NOT_FOUND' | 'INACTIVE';
export type LoginStatus = AuthenticationResult | 'INVALID_CREDENTIALS';

export interface CreateUserInput {
  username: string;
  full_name: string;
  email: string;
  password: string;
  role?: UserRole;
}

export interface AccountWithCapabilities {
  user: UserAccount;
  capabilities: Capability[];
}

export interface LoginResult {
  status: LoginStatus;
  user: UserAccount | null;
  capabilities: Capability[];
  tokens: AuthTokens | null;
}

/**
 * Access Control Service - user accounts, role checks and login bookkeeping
 *
 * Every administrative operation resolves the caller first and fails with
 * AuthorizationException unless the caller is an active admin. Role and status
 * changes that touch admins run at SERIALIZABLE isolation so two concurrent
 * calls cannot both remove the last active administrator.
 */
@Injectable()
export class AccessControlService {
  private readonly logger = new Logger(AccessControlService.name);

  constructor(
    @InjectRepository(UserAccount)
    private userRepository: Repository<UserAccount>,
    private dataSource: DataSource,
    private capabilityService: CapabilityService,
    private tokenService: TokenService,
    private auditService: AuditService,
  ) {}

  async authenticate(username: string): Promise<AuthenticationResult> {
    const account = await this.userRepository.findOne({ where: { username } });
    if (!account) {
      return 'NOT_FOUND';
    }
    return account.is_active ? 'AUTHORIZED' : 'INACTIVE';
  }

  /**
   * Active account for a caller identity, or null when unknown or deactivated
   */
  async resolveActiveAccount(username: string | undefined): Promise<UserAccount | null> {
    if (!username) {
      return null;
    }
    const account = await this.userRepository.findOne({ where: { username } });
    return account && account.is_active ? account : null;
  }

  /**
   * Verify credentials and record the attempt. Unknown, inactive and wrong-password
   * attempts are all written as LOGIN_FAILED; only AUTHORIZED issues an access token.
   */
  async login(username: string, password: string, ipAddress?: string): Promise<LoginResult> {
    const account = await this.userRepository
      .createQueryBuilder('account')
      .addSelect('account.password_hash')
      .where('account.username = :username', { username })
      .getOne();

    let status: LoginStatus;
    if (!account) {
      status = 'NOT_FOUND';
    } else if (!account.is_active) {
      status = 'INACTIVE';
    } else if (!account.password_hash || !(await bcrypt.compare(password, account.password_hash))) {
      status = 'INVALID_CREDENTIALS';
    } else {
      status = 'AUTHORIZED';
    }

    await this.recordLogin(username, status === 'AUTHORIZED', ipAddress);

    if (status !== 'AUTHORIZED' || !account) {
      this.logger.warn(`Login failed for ${username}: ${status}`);
      return { status, user: null, capabilities: [], tokens: null };
    }

    delete account.password_hash;
    account.last_login = await this.lastLoginOf(username);
    return {
      status,
      user: account,
      capabilities: this.capabilityService.getCapabilities(account.role),
      tokens: await this.tokenService.issue(account),
    };
  }

  /**
   * Login bookkeeping: success stamps `last_login`, both outcomes append an activity row
   */
  async recordLogin(
    username: string,
    success: boolean,
    ipAddress?: string,
    manager?: EntityManager,
  ): Promise<void> {
    await inTransaction(this.dataSource, manager, async (tx) => {
      if (!success) {
        await this.auditService.recordUserActivity(tx, username, 'LOGIN_FAILED', 'Failed login attempt', ipAddress);
        return;
      }

      const result = await tx.update(UserAccount, { username }, { last_login: new Date() });
      if (!result.affected) {
        throw new RecordNotFoundException('User', username);
      }
      await this.auditService.recordUserActivity(
        tx,
        username,
        'LOGIN_SUCCESS',
        'User logged in successfully',
        ipAddress,
      );
    });
  }

  async createUser(
    caller: string,
    input: CreateUserInput,
    manager?: EntityManager,
  ): Promise<AccountWithCapabilities> {
    return inTransaction(this.dataSource, manager, async (tx) => {
      await this.assertAdmin(tx, caller, 'create-user', 'Only administrators can create users');
      const user = await this.insertAccount(tx, input, caller);
      this.logger.log(`User ${user.username} created by ${caller} with role ${user.role}`);
      return { user, capabilities: this.capabilityService.getCapabilities(user.role) };
    });
  }

  /**
   * Create the first admin when no account exists yet. Returns false when accounts already exist.
   */
  async ensureBootstrapAdmin(input: Omit<CreateUserInput, 'role'>): Promise<boolean> {
    return this.dataSource.transaction('SERIALIZABLE', async (tx) => {
      if ((await tx.count(UserAccount)) > 0) {
        return false;
      }
      await this.insertAccount(tx, { ...input, role: 'admin' }, null);
      this.logger.log(`Bootstrap administrator ${input.username} created`);
      return true;
    });
  }

  async updateStatus(
    caller: string,
    target: string,
    isActive: boolean,
    manager?: EntityManager,
  ): Promise<UserAccount> {
    return this.serializable(manager, async (tx) => {
      await this.assertAdmin(tx, caller, 'update-user-status', 'Only administrators can update user status');
      const account = await this.findAccount(tx, target);

      if (account.is_active === isActive) {
        return account;
      }
      if (!isActive && account.role === 'admin') {
        await this.assertNotLastActiveAdmin(tx, target, 'Cannot deactivate the last active administrator');
      }

      await tx.update(UserAccount, { username: target }, { is_active: isActive });
      await this.auditService.recordUserActivity(
        tx,
        target,
        'USER_STATUS_CHANGE',
        `User ${target} status changed to ${isActive ? 'ACTIVE' : 'INACTIVE'}`,
      );
      this.logger.log(`User ${target} ${isActive ? 'activated' : 'deactivated'} by ${caller}`);
      return this.findAccount(tx, target);
    });
  }

  async updateRole(
    caller: string,
    target: string,
    role: UserRole,
    manager?: EntityManager,
  ): Promise<UserAccount> {
    return this.serializable(manager, async (tx) => {
      await this.assertAdmin(tx, caller, 'update-user-role', 'Only administrators can change user roles');
      const account = await this.findAccount(tx, target);

      if (account.role === role) {
        return account;
      }
      if (account.role === 'admin' && account.is_active) {
        await this.assertNotLastActiveAdmin(tx, target, 'Cannot demote the last active administrator');
      }

      await tx.update(UserAccount, { username: target }, { role });
      await this.auditService.recordUserActivity(
        tx,
        target,
        'USER_ROLE_CHANGE',
        `User ${target} role changed from ${account.role} to ${role}`,
      );
      this.logger.log(`User ${target} role changed to ${role} by ${caller}`);
      return this.findAccount(tx, target);
    });
  }

  async deleteUser(caller: string, target: string, manager?: EntityManager): Promise<void> {
    await this.serializable(manager, async (tx) => {
      await this.assertAdmin(tx, caller, 'delete-user', 'Only administrators can delete users');
      const account = await this.findAccount(tx, target);

      if (account.role === 'admin' && account.is_active) {
        await this.assertNotLastActiveAdmin(tx, target, 'Cannot delete the last active administrator');
      }

      await tx.delete(UserAccount, { username: target });
      await this.auditService.recordUserActivity(tx, target, 'USER_DELETED', `User ${target} deleted by ${caller}`);
      this.logger.log(`User ${target} deleted by ${caller}`);
    });
  }

  /**
   * All accounts, newest first, without password hashes
   */
  async listUsers(caller: string, manager?: EntityManager): Promise<UserAccount[]> {
    return inTransaction(this.dataSource, manager, async (tx) => {
      await this.assertAdmin(tx, caller, 'list-users', 'Only administrators can view all users');
      const users = await tx.find(UserAccount, { order: { created_at: 'DESC', username: 'ASC' } });
      await this.auditService.recordUserActivity(tx, caller, 'USERS_LISTED', `Listed ${users.length} users`);
      return users;
    });
  }

  private async insertAccount(
    tx: EntityManager,
    input: CreateUserInput,
    createdBy: string | null,
  ): Promise<UserAccount> {
    const role = input.role ?? 'viewer';

    if (await tx.exists(UserAccount, { where: { username: input.username } })) {
      throw new RecordConflictException(`User '${input.username}' already exists`, { username: input.username });
    }
    if (await tx.exists(UserAccount, { where: { email: input.email } })) {
      throw new RecordConflictException(`Email '${input.email}' is already registered`, { email: input.email });
    }

    const passwordHash = await bcrypt.hash(input.password, PASSWORD_HASH_ROUNDS);

    try {
      await tx.insert(UserAccount, {
        username: input.username,
        full_name: input.full_name,
        email: input.email,
        password_hash: passwordHash,
        role,
        is_active: true,
        created_by: createdBy,
      });
    } catch (error) {
      throw translateStoreError(error, { entity: 'User', key: { username: input.username } });
    }

    await this.auditService.recordUserActivity(
      tx,
      input.username,
      'USER_CREATED',
      `User ${input.username} created with role ${role}`,
    );
    return this.findAccount(tx, input.username);
  }

  private async assertAdmin(
    tx: EntityManager,
    caller: string,
    operation: string,
    message: string,
  ): Promise<UserAccount> {
    const account = await tx.findOne(UserAccount, { where: { username: caller } });
    if (!account || !account.is_active || account.role !== 'admin') {
      this.logger.warn(`Denied ${operation} for ${caller || 'anonymous'}`);
      throw new AuthorizationException(caller, operation, message, {
        role: account?.role ?? null,
        is_active: account?.is_active ?? null,
      });
    }
    return account;
  }

  private async assertNotLastActiveAdmin(tx: EntityManager, target: string, message: string): Promise<void> {
    const activeAdmins = await tx.count(UserAccount, { where: { role: 'admin', is_active: true } });
    if (activeAdmins <= 1) {
      throw new InvariantViolationException('user.last_active_admin', message, {
        username: target,
        active_admins: activeAdmins,
      });
    }
  }

  private async findAccount(tx: EntityManager, username: string): Promise<UserAccount> {
    const account = await tx.findOne(UserAccount, { where: { username } });
    if (!account) {
      throw new RecordNotFoundException('User', username);
    }
    return account;
  }

  private async lastLoginOf(username: string): Promise<Date | null> {
    const account = await this.userRepository.findOne({ where: { username } });
    return account?.last_login ?? null;
  }

  private serializable<T>(manager: EntityManager | undefined, work: (tx: EntityManager) => Promise<T>): Promise<T> {
    if (manager) {
      return work(manager);
    }
    return this.dataSource.transaction('SERIALIZABLE', work);
  }
}
