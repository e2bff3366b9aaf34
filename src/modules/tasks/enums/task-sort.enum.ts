export enum TaskSortField {
  DUE_DATE = 'dueDate',
  PRIORITY = 'priority',
  STATUS = 'status',
  CREATED_AT = 'createdAt',
  UPDATED_AT = 'updatedAt',
  TITLE = 'title',
}

export enum SortOrder {
  ASC = 'asc',
  DESC = 'desc',
}
