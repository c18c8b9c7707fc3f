import { IsEmail, IsString, IsNotEmpty, IsOptional, IsIn, MinLength, MaxLength, Matches } from 'class-validator';
import { USER_ROLES, UserRole } from '../entities/user-account.entity';

export class CreateUserDto {
  @IsString()
  @MaxLength(50)
  @Matches(/^[A-Za-z0-9_.-]+$/, { message: 'username may only contain letters, digits, dot, dash and underscore' })
  username!: string;

  @IsString()
  @IsNotEmpty()
  full_name!: string;

  @IsEmail()
  email!: string;

  @IsString()
  @MinLength(8)
  password!: string;

  @IsOptional()
  @IsIn(USER_ROLES)
  role?: UserRole;
}
