import { Test, TestingModule } from '@nestjs/testing';
import { TasksController } from './tasks.controller';
import { TaskApplicationService } from './application/task.application.service';
import { CreateTaskDto } from './dto/create-task.dto';
import { UpdateTaskDto } from './dto/update-task.dto';
import { TaskResponseDto } from './dto/task-response.dto';
import { TaskStatus } from './enums/task-status.enum';
import { TaskPriority } from './enums/task-priority.enum';
import { ResourceNotFoundError } from '../../common/errors/domain.errors';
import { transitionRejection } from './domain/task-lifecycle';
import { FIXED_NOW, OTHER_TASK_ID, TASK_ID, TestUtils } from '../../../test/test-utils';

/**
 * TasksController maps HTTP input onto TaskApplicationService calls and
 * turns aggregates into TaskResponseDto. Errors pass through untouched for
 * the global exception filter.
 */
describe('TasksController', () => {
  let controller: TasksController;
  let taskService: jest.Mocked<TaskApplicationService>;

  const mockTaskService = {
    createTask: jest.fn(),
    completeTask: jest.fn(),
    startTask: jest.fn(),
    cancelTask: jest.fn(),
    updateTask: jest.fn(),
    getTaskById: jest.fn(),
    listTasksByUser: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [TasksController],
      providers: [
        {
          provide: TaskApplicationService,
          useValue: mockTaskService,
        },
      ],
    }).compile();

    controller = module.get<TasksController>(TasksController);
    taskService = module.get(TaskApplicationService);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  describe('create', () => {
    it('should create a task and return its representation', async () => {
      // Arrange
      const dto: CreateTaskDto = {
        title: 'Quarterly VAT return',
        description: 'Prepare and file the Q1 VAT return',
        ownerId: 1,
        priority: TaskPriority.HIGH,
      };
      taskService.createTask.mockResolvedValue(TestUtils.task({ priority: TaskPriority.HIGH }));

      // Act
      const result = await controller.create(dto);

      // Assert
      expect(taskService.createTask).toHaveBeenCalledWith(dto);
      expect(result).toBeInstanceOf(TaskResponseDto);
      expect(result).toEqual({
        id: TASK_ID,
        title: 'Quarterly VAT return',
        description: 'Prepare and file the Q1 VAT return',
        ownerId: 1,
        status: TaskStatus.PENDING,
        priority: TaskPriority.HIGH,
        createdAt: FIXED_NOW,
        updatedAt: FIXED_NOW,
        completedAt: null,
      });
    });

    it('should propagate USER_NOT_FOUND from the service', async () => {
      const error = ResourceNotFoundError.user(99);
      taskService.createTask.mockRejectedValue(error);

      await expect(controller.create({ title: 't', description: 'd', ownerId: 99 })).rejects.toBe(error);
    });
  });

  describe('findByOwner', () => {
    it('should list the owner tasks with the status filter', async () => {
      taskService.listTasksByUser.mockResolvedValue([
        TestUtils.task({ id: TASK_ID, status: TaskStatus.IN_PROGRESS }),
        TestUtils.task({ id: OTHER_TASK_ID, status: TaskStatus.IN_PROGRESS }),
      ]);

      const result = await controller.findByOwner({ ownerId: 1, status: TaskStatus.IN_PROGRESS });

      expect(taskService.listTasksByUser).toHaveBeenCalledWith(1, TaskStatus.IN_PROGRESS);
      expect(result.map(task => task.id)).toEqual([TASK_ID, OTHER_TASK_ID]);
    });

    it('should pass an undefined status when none is given', async () => {
      taskService.listTasksByUser.mockResolvedValue([]);

      const result = await controller.findByOwner({ ownerId: 2 });

      expect(taskService.listTasksByUser).toHaveBeenCalledWith(2, undefined);
      expect(result).toEqual([]);
    });
  });

  describe('findOne', () => {
    it('should return the task', async () => {
      taskService.getTaskById.mockResolvedValue(TestUtils.task());

      const result = await controller.findOne({ id: TASK_ID });

      expect(taskService.getTaskById).toHaveBeenCalledWith(TASK_ID);
      expect(result.id).toBe(TASK_ID);
    });

    it('should propagate TASK_NOT_FOUND', async () => {
      const error = ResourceNotFoundError.task(TASK_ID);
      taskService.getTaskById.mockRejectedValue(error);

      await expect(controller.findOne({ id: TASK_ID })).rejects.toBe(error);
    });
  });

  describe('update', () => {
    it('should pass the id and the partial content', async () => {
      const dto: UpdateTaskDto = { title: 'Q1 VAT return' };
      taskService.updateTask.mockResolvedValue(TestUtils.task({ title: 'Q1 VAT return' }));

      const result = await controller.update({ id: TASK_ID }, dto);

      expect(taskService.updateTask).toHaveBeenCalledWith(TASK_ID, dto);
      expect(result.title).toBe('Q1 VAT return');
    });
  });

  describe('lifecycle endpoints', () => {
    it('should start a task', async () => {
      taskService.startTask.mockResolvedValue(TestUtils.task({ status: TaskStatus.IN_PROGRESS }));

      const result = await controller.start({ id: TASK_ID });

      expect(taskService.startTask).toHaveBeenCalledWith(TASK_ID);
      expect(result.status).toBe(TaskStatus.IN_PROGRESS);
    });

    it('should complete a task and expose completedAt', async () => {
      const completedAt = new Date('2024-03-02T16:45:00.000Z');
      taskService.completeTask.mockResolvedValue(
        TestUtils.task({ status: TaskStatus.COMPLETED, completedAt, updatedAt: completedAt }),
      );

      const result = await controller.complete({ id: TASK_ID });

      expect(taskService.completeTask).toHaveBeenCalledWith(TASK_ID);
      expect(result.status).toBe(TaskStatus.COMPLETED);
      expect(result.completedAt).toEqual(completedAt);
    });

    it('should propagate a rejected completion', async () => {
      const error = transitionRejection(TASK_ID, TaskStatus.COMPLETED, 'complete');
      taskService.completeTask.mockRejectedValue(error);

      await expect(controller.complete({ id: TASK_ID })).rejects.toBe(error);
    });

    it('should cancel a task', async () => {
      taskService.cancelTask.mockResolvedValue(TestUtils.task({ status: TaskStatus.CANCELLED }));

      const result = await controller.cancel({ id: TASK_ID });

      expect(taskService.cancelTask).toHaveBeenCalledWith(TASK_ID);
      expect(result.status).toBe(TaskStatus.CANCELLED);
    });
  });
});
