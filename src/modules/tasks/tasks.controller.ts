import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import type { ApiResponse, AuthUser } from '../../common/types';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { BatchTaskIdsDto } from './dto/batch-task-ids.dto';
import { BatchUpdateStatusDto } from './dto/batch-update-status.dto';
import { CreateTaskDto } from './dto/create-task.dto';
import { SearchTasksDto } from './dto/search-tasks.dto';
import { TaskFilterDto } from './dto/task-filter.dto';
import {
  BatchOperationResultDto,
  PaginatedTaskResponseDto,
  TaskResponseDto,
} from './dto/task-response.dto';
import { UpdateTaskDto } from './dto/update-task.dto';
import {
  BatchOperationResult,
  PaginatedTaskResponse,
  TaskResponse,
} from './interfaces/task-results.interface';
import { TasksService } from './tasks.service';

function ok<T>(data: T, message?: string): ApiResponse<T> {
  return message ? { success: true, message, data } : { success: true, data };
}

@ApiTags('tasks')
@Controller('tasks')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth()
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Post()
  @ApiOkResponse({ type: TaskResponseDto })
  async create(
    @Body() createTaskDto: CreateTaskDto,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<TaskResponse>> {
    return ok(await this.tasksService.createTask(user, createTaskDto), 'Task created');
  }

  @Get()
  @ApiOkResponse({ type: PaginatedTaskResponseDto })
  async findAll(
    @Query() filterDto: TaskFilterDto,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<PaginatedTaskResponse>> {
    return ok(await this.tasksService.listTasks(user, filterDto));
  }

  @Get('search')
  @ApiOkResponse({ type: PaginatedTaskResponseDto })
  async search(
    @Query() searchDto: SearchTasksDto,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<PaginatedTaskResponse>> {
    const { q, ...options } = searchDto;
    return ok(await this.tasksService.searchTasks(user, q, options));
  }

  @Post('batch/delete')
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ type: BatchOperationResultDto })
  async batchDelete(
    @Body() batchDto: BatchTaskIdsDto,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<BatchOperationResult>> {
    const result = await this.tasksService.batchDelete(user, batchDto.taskIds);
    return ok(result, `${result.successful} tasks deleted, ${result.failed} failed`);
  }

  @Post('batch/status')
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ type: BatchOperationResultDto })
  async batchUpdateStatus(
    @Body() batchDto: BatchUpdateStatusDto,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<BatchOperationResult>> {
    const result = await this.tasksService.batchUpdateStatus(
      user,
      batchDto.taskIds,
      batchDto.status,
    );
    return ok(result, `${result.successful} tasks updated, ${result.failed} failed`);
  }

  @Get(':id')
  @ApiOkResponse({ type: TaskResponseDto })
  async findOne(
    @Param('id') id: string,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<TaskResponse>> {
    return ok(await this.tasksService.getTask(id, user));
  }

  @Put(':id')
  @ApiOkResponse({ type: TaskResponseDto })
  async update(
    @Param('id') id: string,
    @Body() updateTaskDto: UpdateTaskDto,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<TaskResponse>> {
    return ok(await this.tasksService.updateTask(user, id, updateTaskDto), 'Task updated');
  }

  @Delete(':id')
  async remove(
    @Param('id') id: string,
    @CurrentUser() user: AuthUser,
  ): Promise<ApiResponse<{ deleted: boolean }>> {
    const deleted = await this.tasksService.deleteTask(user, id);
    return ok({ deleted }, 'Task deleted');
  }
}
