import { Body, Controller, ForbiddenException, Get, Inject, Post, UseGuards } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/configuration';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CurrentUser, type CurrentUserData } from '../auth/decorators/current-user.decorator';
import { CreateUserDto, type UserReadDto } from './dto/user.dto';
import { UsersService, toUserRead } from './users.service';

@Controller('users')
export class UsersController {
  constructor(
    private readonly usersService: UsersService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Post()
  async register(@Body() dto: CreateUserDto): Promise<UserReadDto> {
    if (!this.config.auth.enablePasswordAuth) {
      throw new ForbiddenException('Password authentication is disabled');
    }
    return toUserRead(await this.usersService.register(dto));
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  getCurrentUser(@CurrentUser() user: CurrentUserData): UserReadDto {
    return toUserRead(user);
  }
}
