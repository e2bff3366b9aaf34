import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import tasksConfig from '../../config/tasks.config';
import { CLOCK, FixedClock, SystemClock } from '../../common/services/clock.service';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../users/users.module';
import { TaskBatchCoordinator } from './engines/task-batch.coordinator';
import { TaskQueryEngine } from './engines/task-query.engine';
import { TaskSearchEngine } from './engines/task-search.engine';
import { TaskStatisticsAggregator } from './engines/task-statistics.aggregator';
import { Task } from './entities/task.entity';
import { StatsController } from './stats.controller';
import { TasksController } from './tasks.controller';
import { TasksRepository } from './tasks.repository';
import { TASKS_REPOSITORY } from './tasks.repository.interface';
import { TasksService } from './tasks.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Task]),
    ConfigModule.forFeature(tasksConfig),
    UsersModule,
    AuthModule,
  ],
  controllers: [TasksController, StatsController],
  providers: [
    TasksService,
    TaskQueryEngine,
    TaskSearchEngine,
    TaskBatchCoordinator,
    TaskStatisticsAggregator,
    {
      provide: TASKS_REPOSITORY,
      useClass: TasksRepository,
    },
    {
      provide: CLOCK,
      inject: [tasksConfig.KEY],
      useFactory: (config: ConfigType<typeof tasksConfig>) =>
        config.fixedDate ? new FixedClock(config.fixedDate) : new SystemClock(),
    },
  ],
  exports: [TasksService],
})
export class TasksModule {}
