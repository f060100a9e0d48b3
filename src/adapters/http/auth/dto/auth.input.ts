// src/adapters/http/auth/dto/auth.input.ts
import { UserRole } from '@app-types/models/user.types';
import { IsDefined, IsEmail, IsIn, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { REQUIRED_MESSAGE, Trim } from '../../dto.transforms';

export class RegisterInput {
  @IsDefined({ message: REQUIRED_MESSAGE })
  @Trim()
  @MinLength(3, { message: 'Username must be at least 3 characters long.' })
  @MaxLength(150, { message: 'Ensure this field has no more than 150 characters.' })
  @IsString({ message: 'Not a valid string.' })
  username!: string;

  @IsDefined({ message: REQUIRED_MESSAGE })
  @Trim()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email!: string;

  @IsDefined({ message: REQUIRED_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  password!: string;

  /** 自助注册只允许 student / instructor */
  @IsOptional()
  @IsIn([UserRole.STUDENT, UserRole.INSTRUCTOR], { message: 'Select a valid role.' })
  role?: UserRole.STUDENT | UserRole.INSTRUCTOR;
}

export class LoginInput {
  @IsDefined({ message: REQUIRED_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  username!: string;

  @IsDefined({ message: REQUIRED_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  password!: string;
}

export class RefreshInput {
  @IsDefined({ message: REQUIRED_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  refresh!: string;
}
