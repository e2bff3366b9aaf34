/**
 * Chainable stand-in for a TypeORM query builder over a fixed row set.
 * It honours skip/take and the never-matching `1 = 0` condition; every
 * other clause is only recorded.
 */
export class FakeQueryBuilder<T> {
  private offset = 0;
  private limit = Number.POSITIVE_INFINITY;
  private matchesNothing = false;

  readonly where = jest.fn((condition: string, _parameters?: Record<string, string>) => {
    this.matchesNothing = condition === '1 = 0';
    return this;
  });
  readonly select = jest.fn((_selection?: string | string[]) => this);
  readonly orderBy = jest.fn((_sort: string, _order?: 'ASC' | 'DESC') => this);
  readonly addOrderBy = jest.fn((_sort: string, _order?: 'ASC' | 'DESC') => this);
  readonly skip = jest.fn((offset: number) => {
    this.offset = offset;
    return this;
  });
  readonly take = jest.fn((limit: number) => {
    this.limit = limit;
    return this;
  });
  readonly update = jest.fn(() => this);
  readonly set = jest.fn((_changes: object) => this);
  readonly delete = jest.fn(() => this);
  readonly from = jest.fn(() => this);

  readonly getMany = jest.fn(async () => this.rows().slice(this.offset, this.offset + this.limit));
  readonly getOne = jest.fn(async () => this.rows()[0] ?? null);
  readonly getCount = jest.fn(async () => this.rows().length);
  readonly execute = jest.fn(async () => ({ affected: 1 }));

  constructor(private readonly source: readonly T[]) {}

  private rows(): readonly T[] {
    return this.matchesNothing ? [] : this.source;
  }
}
