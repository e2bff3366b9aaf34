import { User } from './entities/user.entity';

export interface IUsersRepository {
  findById(id: string): Promise<User | null>;
}

export const USERS_REPOSITORY = Symbol('USERS_REPOSITORY');
