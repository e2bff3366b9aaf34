import { TaskPriority } from '../enums/task-priority.enum';
import { SortOrder, TaskSortField } from '../enums/task-sort.enum';
import { TaskStatus } from '../enums/task-status.enum';

export interface TaskFilterOptions {
  status?: TaskStatus;
  priority?: TaskPriority;
  assignedTo?: string;
  createdBy?: string;
  startDate?: string;
  endDate?: string;
  page?: number;
  pageSize?: number;
  sortBy?: TaskSortField;
  sortOrder?: SortOrder;
}

export interface TaskResponse {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  dueDate: string;
  createdBy: string;
  assignedTo: string | null;
  timezone: string;
  isOverdue: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface PaginationInfo {
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export interface PaginatedTaskResponse {
  tasks: TaskResponse[];
  pagination: PaginationInfo;
}

export interface BatchOperationResult {
  successful: number;
  failed: number;
  successfulIds: string[];
  failedIds: string[];
  errors: Record<string, string>;
}

export interface TaskStatistics {
  total: number;
  byStatus: Record<TaskStatus, number>;
  byPriority: Record<TaskPriority, number>;
  overdue: number;
}
