import { IsEmail, IsString, Matches, MaxLength, MinLength } from 'class-validator';
import { USERNAME_PATTERN } from '../username';

export class CreateUserDto {
  @IsString()
  @MinLength(2)
  @MaxLength(30)
  name!: string;

  @IsString()
  @MinLength(2)
  @MaxLength(64)
  @Matches(USERNAME_PATTERN, {
    message: 'username may only contain lowercase letters, digits, ".", "_", "+" and "-"',
  })
  username!: string;

  @IsEmail()
  email!: string;

  @IsString()
  @MinLength(8)
  password!: string;
}

export interface UserReadDto {
  id: string;
  name: string;
  username: string;
  email: string;
  profile_image_url: string | null;
  is_superuser: boolean;
  created_at: string;
}
