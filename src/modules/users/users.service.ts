import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DirectoryUser, UserStatus } from './models/user.model';
import { loadUserDirectory } from './user-directory.loader';
import { UserExistenceCheck } from '../tasks/domain/user-existence-check';
import { ResourceNotFoundError } from '../../common/errors/domain.errors';

/**
 * In-process user directory.
 *
 * @remarks
 * Users are loaded once at startup from a JSON file (`users.directoryFile`,
 * or the bundled directory). Activation changes live in memory only and are
 * lost on restart.
 *
 * Also serves as the task module's UserExistenceCheck.
 */
@Injectable()
export class UsersService implements UserExistenceCheck {
  private readonly logger = new Logger(UsersService.name);
  private readonly users = new Map<number, DirectoryUser>();

  constructor(configService: ConfigService) {
    const directoryFile = configService.get<string>('users.directoryFile');
    for (const user of loadUserDirectory(directoryFile)) {
      this.users.set(user.id, user);
    }
    this.logger.log(`User directory loaded with ${this.users.size} users`);
  }

  /**
   * @returns Every directory user, ordered by id
   */
  findAll(): DirectoryUser[] {
    return [...this.users.values()].sort((a, b) => a.id - b.id);
  }

  /**
   * @throws ResourceNotFoundError (USER_NOT_FOUND) for an unknown id
   */
  findById(id: number): DirectoryUser {
    const user = this.users.get(id);
    if (!user) {
      throw ResourceNotFoundError.user(id);
    }
    return user;
  }

  async exists(ownerId: number): Promise<boolean> {
    return this.users.has(ownerId);
  }

  async existsAndActive(ownerId: number): Promise<boolean> {
    return this.users.get(ownerId)?.isActive() ?? false;
  }

  activate(id: number): DirectoryUser {
    return this.changeStatus(id, UserStatus.ACTIVE);
  }

  deactivate(id: number): DirectoryUser {
    return this.changeStatus(id, UserStatus.INACTIVE);
  }

  private changeStatus(id: number, status: UserStatus): DirectoryUser {
    const user = this.findById(id);
    if (user.status !== status) {
      this.logger.log(`User ${id} status changed: ${user.status} -> ${status}`);
      user.status = status;
    }
    return user;
  }
}
