import { Body, Controller, Get, HttpCode, HttpStatus, Param, Patch, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { TaskApplicationService } from './application/task.application.service';
import { CreateTaskDto } from './dto/create-task.dto';
import { UpdateTaskDto } from './dto/update-task.dto';
import { TaskFilterDto, TaskIdParamDto } from './dto/task-filter.dto';
import { TaskResponseDto } from './dto/task-response.dto';
import { RateLimit } from '../../common/decorators/rate-limit.decorator';

@ApiTags('tasks')
@Controller('tasks')
export class TasksController {
  constructor(private readonly taskService: TaskApplicationService) {}

  /**
   * Create a new pending task for an active user
   * @returns The stored task, with its generated id and timestamps
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @RateLimit({ limit: 30, windowMs: 60000 })
  @ApiOperation({
    summary: 'Create a task',
    description: 'Creates a pending task owned by an existing, active user',
  })
  @ApiResponse({ status: 201, type: TaskResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid title, description, owner id or priority' })
  @ApiResponse({ status: 404, description: 'Owner does not exist or is inactive' })
  @ApiResponse({ status: 422, description: 'Owner already has the maximum number of active tasks' })
  async create(@Body() createTaskDto: CreateTaskDto): Promise<TaskResponseDto> {
    const task = await this.taskService.createTask(createTaskDto);
    return TaskResponseDto.fromAggregate(task);
  }

  /**
   * List a user's tasks, oldest first
   */
  @Get()
  @ApiOperation({
    summary: 'List tasks of a user',
    description: 'Returns every task owned by the user, ordered by creation time, optionally filtered by status',
  })
  @ApiResponse({ status: 200, type: TaskResponseDto, isArray: true })
  @ApiResponse({ status: 404, description: 'User does not exist' })
  async findByOwner(@Query() filter: TaskFilterDto): Promise<TaskResponseDto[]> {
    const tasks = await this.taskService.listTasksByUser(filter.ownerId, filter.status);
    return tasks.map(task => TaskResponseDto.fromAggregate(task));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Find a task by ID' })
  @ApiResponse({ status: 200, type: TaskResponseDto })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async findOne(@Param() params: TaskIdParamDto): Promise<TaskResponseDto> {
    const task = await this.taskService.getTaskById(params.id);
    return TaskResponseDto.fromAggregate(task);
  }

  /**
   * Edit the title and/or description of a task that is not yet finished
   */
  @Patch(':id')
  @ApiOperation({
    summary: 'Update task content',
    description: 'Only the supplied fields change. Completed and cancelled tasks cannot be edited.',
  })
  @ApiResponse({ status: 200, type: TaskResponseDto })
  @ApiResponse({ status: 422, description: 'Task is completed or cancelled' })
  async update(@Param() params: TaskIdParamDto, @Body() updateTaskDto: UpdateTaskDto): Promise<TaskResponseDto> {
    const task = await this.taskService.updateTask(params.id, updateTaskDto);
    return TaskResponseDto.fromAggregate(task);
  }

  @Patch(':id/start')
  @ApiOperation({ summary: 'Start a task', description: 'Moves a pending task to in_progress' })
  @ApiResponse({ status: 200, type: TaskResponseDto })
  @ApiResponse({ status: 422, description: 'Task is not pending' })
  async start(@Param() params: TaskIdParamDto): Promise<TaskResponseDto> {
    const task = await this.taskService.startTask(params.id);
    return TaskResponseDto.fromAggregate(task);
  }

  /**
   * Mark a task as completed
   */
  @Patch(':id/complete')
  @ApiOperation({
    summary: 'Complete a task',
    description: 'Completes a pending or in-progress task and records the completion time',
  })
  @ApiResponse({ status: 200, type: TaskResponseDto })
  @ApiResponse({ status: 404, description: 'Task not found' })
  @ApiResponse({ status: 422, description: 'Task is already completed or cancelled' })
  async complete(@Param() params: TaskIdParamDto): Promise<TaskResponseDto> {
    const task = await this.taskService.completeTask(params.id);
    return TaskResponseDto.fromAggregate(task);
  }

  @Patch(':id/cancel')
  @ApiOperation({ summary: 'Cancel a task' })
  @ApiResponse({ status: 200, type: TaskResponseDto })
  @ApiResponse({ status: 422, description: 'Task is already completed or cancelled' })
  async cancel(@Param() params: TaskIdParamDto): Promise<TaskResponseDto> {
    const task = await this.taskService.cancelTask(params.id);
    return TaskResponseDto.fromAggregate(task);
  }
}
