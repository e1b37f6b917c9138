import { Test, TestingModule } from '@nestjs/testing';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import { TaskApplicationService } from './task.application.service';
import {
  CancelTaskCommand,
  CompleteTaskCommand,
  CreateTaskCommand,
  StartTaskCommand,
  UpdateTaskContentCommand,
} from './commands/task.commands';
import { GetTaskByIdQuery, ListTasksByUserQuery } from './queries/task.queries';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskPriority } from '../enums/task-priority.enum';
import { TASK_ID, TestUtils } from '../../../../test/test-utils';

describe('TaskApplicationService', () => {
  let service: TaskApplicationService;

  const mockCommandBus = { execute: jest.fn() };
  const mockQueryBus = { execute: jest.fn() };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TaskApplicationService,
        { provide: CommandBus, useValue: mockCommandBus },
        { provide: QueryBus, useValue: mockQueryBus },
      ],
    }).compile();

    service = module.get(TaskApplicationService);
  });

  it('should dispatch CreateTaskCommand with the DTO fields', async () => {
    const task = TestUtils.task();
    mockCommandBus.execute.mockResolvedValue(task);

    const result = await service.createTask({
      title: 'Payroll',
      description: 'Run payroll',
      ownerId: 2,
      priority: TaskPriority.LOW,
    });

    expect(result).toBe(task);
    expect(mockCommandBus.execute).toHaveBeenCalledWith(
      new CreateTaskCommand('Payroll', 'Run payroll', 2, TaskPriority.LOW),
    );
  });

  it.each([
    ['completeTask', new CompleteTaskCommand(TASK_ID)],
    ['startTask', new StartTaskCommand(TASK_ID)],
    ['cancelTask', new CancelTaskCommand(TASK_ID)],
  ] as const)('%s should dispatch its command', async (method, command) => {
    mockCommandBus.execute.mockResolvedValue(TestUtils.task());

    await service[method](TASK_ID);

    expect(mockCommandBus.execute).toHaveBeenCalledWith(command);
    expect(mockCommandBus.execute.mock.calls[0][0]).toBeInstanceOf(command.constructor);
  });

  it('should dispatch UpdateTaskContentCommand', async () => {
    mockCommandBus.execute.mockResolvedValue(TestUtils.task());

    await service.updateTask(TASK_ID, { description: 'New description' });

    expect(mockCommandBus.execute).toHaveBeenCalledWith(
      new UpdateTaskContentCommand(TASK_ID, undefined, 'New description'),
    );
  });

  it('should run the read queries on the query bus', async () => {
    mockQueryBus.execute.mockResolvedValue([]);

    await service.getTaskById(TASK_ID);
    await service.listTasksByUser(3, TaskStatus.PENDING);

    expect(mockQueryBus.execute).toHaveBeenNthCalledWith(1, new GetTaskByIdQuery(TASK_ID));
    expect(mockQueryBus.execute).toHaveBeenNthCalledWith(2, new ListTasksByUserQuery(3, TaskStatus.PENDING));
    expect(mockCommandBus.execute).not.toHaveBeenCalled();
  });
});
