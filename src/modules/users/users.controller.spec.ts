import { Test, TestingModule } from '@nestjs/testing';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';
import { DirectoryUser, UserStatus } from './models/user.model';
import { ResourceNotFoundError } from '../../common/errors/domain.errors';

function directoryUser(id: number, status: UserStatus): DirectoryUser {
  const user = new DirectoryUser();
  user.id = id;
  user.name = `User ${id}`;
  user.email = `user${id}@example.com`;
  user.status = status;
  return user;
}

describe('UsersController', () => {
  let controller: UsersController;
  let usersService: jest.Mocked<UsersService>;

  const mockUsersService = {
    findAll: jest.fn(),
    findById: jest.fn(),
    activate: jest.fn(),
    deactivate: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [UsersController],
      providers: [{ provide: UsersService, useValue: mockUsersService }],
    }).compile();

    controller = module.get<UsersController>(UsersController);
    usersService = module.get(UsersService);
  });

  it('should list users', () => {
    const users = [directoryUser(1, UserStatus.ACTIVE), directoryUser(2, UserStatus.INACTIVE)];
    usersService.findAll.mockReturnValue(users);

    expect(controller.findAll()).toBe(users);
  });

  it('should return a single user', () => {
    const user = directoryUser(3, UserStatus.ACTIVE);
    usersService.findById.mockReturnValue(user);

    expect(controller.findOne({ id: 3 })).toBe(user);
    expect(usersService.findById).toHaveBeenCalledWith(3);
  });

  it('should propagate USER_NOT_FOUND', () => {
    usersService.findById.mockImplementation(id => {
      throw ResourceNotFoundError.user(id);
    });

    expect(() => controller.findOne({ id: 8 })).toThrow("User with ID '8' not found");
  });

  it('should activate and deactivate users', () => {
    usersService.activate.mockReturnValue(directoryUser(4, UserStatus.ACTIVE));
    usersService.deactivate.mockReturnValue(directoryUser(5, UserStatus.INACTIVE));

    expect(controller.activate({ id: 4 }).status).toBe(UserStatus.ACTIVE);
    expect(controller.deactivate({ id: 5 }).status).toBe(UserStatus.INACTIVE);
    expect(usersService.activate).toHaveBeenCalledWith(4);
    expect(usersService.deactivate).toHaveBeenCalledWith(5);
  });
});
