import { IsIn } from 'class-validator';
import { USER_ROLES, UserRole } from '../entities/user-account.entity';

export class UpdateUserRoleDto {
  @IsIn(USER_ROLES)
  role!: UserRole;
}
