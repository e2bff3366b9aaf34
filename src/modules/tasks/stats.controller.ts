import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import type { ApiResponse, AuthUser } from '../../common/types';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { TaskStatisticsDto } from './dto/task-response.dto';
import { TaskStatistics } from './interfaces/task-results.interface';
import { TasksService } from './tasks.service';

@ApiTags('stats')
@Controller('stats')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth()
export class StatsController {
  constructor(private readonly tasksService: TasksService) {}

  @Get('tasks')
  @ApiOkResponse({ type: TaskStatisticsDto })
  async taskStatistics(@CurrentUser() user: AuthUser): Promise<ApiResponse<TaskStatistics>> {
    return { success: true, data: await this.tasksService.getStatistics(user) };
  }
}
