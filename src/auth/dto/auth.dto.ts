import { IsString, MinLength } from 'class-validator';

export class LoginDto {
  /** Username or email address. */
  @IsString()
  @MinLength(1)
  username!: string;

  @IsString()
  password!: string;
}

export class TokenResponseDto {
  access_token!: string;
  token_type!: 'bearer';
}
