/**
 * Store-agnostic task filter. Repositories translate it into their own
 * query language; field names come from a closed set and values are always
 * passed as bound parameters.
 */
export type TaskFilterField = 'id' | 'status' | 'priority' | 'createdBy' | 'assignedTo';

export type TaskFilter =
  | { kind: 'all' }
  | { kind: 'eq'; field: TaskFilterField; value: string }
  | { kind: 'dueDateRange'; from?: string; to?: string }
  | { kind: 'and'; filters: TaskFilter[] }
  | { kind: 'or'; filters: TaskFilter[] };

const MATCH_ALL: TaskFilter = { kind: 'all' };

export const TaskFilters = {
  all(): TaskFilter {
    return MATCH_ALL;
  },

  eq(field: TaskFilterField, value: string): TaskFilter {
    return { kind: 'eq', field, value };
  },

  byId(id: string): TaskFilter {
    return { kind: 'eq', field: 'id', value: id };
  },

  dueDateBetween(from?: string, to?: string): TaskFilter {
    if (from === undefined && to === undefined) {
      return MATCH_ALL;
    }
    return { kind: 'dueDateRange', from, to };
  },

  /** Conjunction; `all` members are dropped and a single member is unwrapped. */
  and(...filters: TaskFilter[]): TaskFilter {
    const parts = filters.filter(filter => filter.kind !== 'all');
    if (parts.length === 0) {
      return MATCH_ALL;
    }
    return parts.length === 1 ? parts[0] : { kind: 'and', filters: parts };
  },

  or(...filters: TaskFilter[]): TaskFilter {
    if (filters.some(filter => filter.kind === 'all')) {
      return MATCH_ALL;
    }
    return filters.length === 1 ? filters[0] : { kind: 'or', filters };
  },
};

export interface CompiledTaskFilter {
  where: string;
  parameters: Record<string, string>;
}

/**
 * Compiles a filter into a TypeORM query-builder condition over `alias`.
 *
 * @example
 * compileTaskFilter(TaskFilters.eq('status', 'TODO'))
 * // { where: 'task.status = :f0', parameters: { f0: 'TODO' } }
 */
export function compileTaskFilter(filter: TaskFilter, alias = 'task'): CompiledTaskFilter {
  const parameters: Record<string, string> = {};
  let counter = 0;

  const bind = (value: string): string => {
    const name = `f${counter++}`;
    parameters[name] = value;
    return `:${name}`;
  };

  const visit = (node: TaskFilter): string => {
    switch (node.kind) {
      case 'all':
        return '1 = 1';
      case 'eq':
        return `${alias}.${node.field} = ${bind(node.value)}`;
      case 'dueDateRange': {
        const bounds: string[] = [];
        if (node.from !== undefined) {
          bounds.push(`${alias}.dueDate >= ${bind(node.from)}`);
        }
        if (node.to !== undefined) {
          bounds.push(`${alias}.dueDate <= ${bind(node.to)}`);
        }
        return bounds.length > 0 ? bounds.join(' AND ') : '1 = 1';
      }
      case 'and':
        return node.filters.length > 0
          ? node.filters.map(child => `(${visit(child)})`).join(' AND ')
          : '1 = 1';
      case 'or':
        return node.filters.length > 0
          ? node.filters.map(child => `(${visit(child)})`).join(' OR ')
          : '1 = 0';
      default: {
        const unreachable: never = node;
        throw new Error(`Unsupported task filter: ${JSON.stringify(unreachable)}`);
      }
    }
  };

  return { where: visit(filter), parameters };
}
