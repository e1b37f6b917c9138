import { Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { UsersService } from './users.service';
import { DirectoryUser } from './models/user.model';
import { UserIdParamDto } from './dto/user-id-param.dto';

/**
 * Read access to the user directory, plus activation toggles.
 * Deactivated users keep their tasks but cannot be given new ones.
 */
@ApiTags('users')
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  @ApiOperation({ summary: 'List directory users' })
  @ApiResponse({ status: 200, type: DirectoryUser, isArray: true })
  findAll(): DirectoryUser[] {
    return this.usersService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Find a directory user by ID' })
  @ApiResponse({ status: 200, type: DirectoryUser })
  @ApiResponse({ status: 404, description: 'User not found' })
  findOne(@Param() params: UserIdParamDto): DirectoryUser {
    return this.usersService.findById(params.id);
  }

  @Post(':id/activate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Activate a user', description: 'The user may receive new tasks again' })
  @ApiResponse({ status: 200, type: DirectoryUser })
  activate(@Param() params: UserIdParamDto): DirectoryUser {
    return this.usersService.activate(params.id);
  }

  @Post(':id/deactivate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Deactivate a user', description: 'Existing tasks are kept; task creation is refused' })
  @ApiResponse({ status: 200, type: DirectoryUser })
  deactivate(@Param() params: UserIdParamDto): DirectoryUser {
    return this.usersService.deactivate(params.id);
  }
}
