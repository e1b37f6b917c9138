import { Module } from '@nestjs/common';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';
import { USER_EXISTENCE_CHECK } from '../tasks/domain/user-existence-check';

/**
 * Users module exposing the in-process user directory.
 *
 * @remarks
 * Exports UsersService under the USER_EXISTENCE_CHECK token so the task use
 * cases depend only on that narrow interface.
 */
@Module({
  controllers: [UsersController],
  providers: [UsersService, { provide: USER_EXISTENCE_CHECK, useExisting: UsersService }],
  exports: [UsersService, USER_EXISTENCE_CHECK],
})
export class UsersModule {}
