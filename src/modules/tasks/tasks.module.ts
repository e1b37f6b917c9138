import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CqrsModule } from '@nestjs/cqrs';
import { TasksController } from './tasks.controller';
import { Task } from './entities/task.entity';
import { TaskRepository } from './infrastructure/task.repository';
import { TASK_GATEWAY } from './domain/task.gateway';
import { TaskApplicationService } from './application/task.application.service';
import {
  CancelTaskHandler,
  CompleteTaskHandler,
  CreateTaskHandler,
  StartTaskHandler,
  UpdateTaskContentHandler,
} from './application/commands/task.handlers';
import { GetTaskByIdHandler, ListTasksByUserHandler } from './application/queries/task.handlers';
import { TaskNotificationsHandler } from './application/events/task-notifications.handler';
import { UsersModule } from '../users/users.module';

/**
 * CQRS command handlers: one per state-changing use case
 */
const CommandHandlers = [
  CreateTaskHandler,
  CompleteTaskHandler,
  StartTaskHandler,
  CancelTaskHandler,
  UpdateTaskContentHandler,
];

const QueryHandlers = [GetTaskByIdHandler, ListTasksByUserHandler];

const EventHandlers = [TaskNotificationsHandler];

/**
 * Tasks Module - task lifecycle management
 *
 * The use cases depend on the TASK_GATEWAY and USER_EXISTENCE_CHECK tokens;
 * this module binds the first to the TypeORM repository, UsersModule the second.
 */
@Module({
  imports: [CqrsModule, TypeOrmModule.forFeature([Task]), UsersModule],
  controllers: [TasksController],
  providers: [
    { provide: TASK_GATEWAY, useClass: TaskRepository },
    TaskApplicationService,
    ...CommandHandlers,
    ...QueryHandlers,
    ...EventHandlers,
  ],
  exports: [TaskApplicationService],
})
export class TasksModule {}
