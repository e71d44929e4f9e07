/**
 * User Service
 *
 * @packageDocumentation
 */

import { NotFoundError } from "../contracts/errors.js"
import type { ResourceConfig, User } from "../contracts/types.js"
import type { SqliteDatabase } from "../persistence/database.js"
import {
  SqliteRepository,
  type Repository,
} from "../persistence/repository.js"
import { ResourceService } from "../resource/resource-service.js"
import {
  USER_RESOURCE,
  USER_TABLE,
  type CreateUserInput,
  type UpdateUserInput,
} from "./definition.js"

export class UserService extends ResourceService<
  User,
  CreateUserInput,
  UpdateUserInput
> {
  constructor(repository: Repository<User>, config?: Partial<ResourceConfig>) {
    super(repository, USER_RESOURCE, config)
  }

  static fromDatabase(
    db: SqliteDatabase,
    config?: Partial<ResourceConfig>,
  ): UserService {
    return new UserService(new SqliteRepository(db, USER_TABLE), config)
  }

  async getByEmail(email: string): Promise<User> {
    const user = await this.repository.findOne([
      { column: "email", operator: "=", value: email.trim().toLowerCase() },
    ])
    if (!user) {
      throw new NotFoundError(`User with email ${email} not found`)
    }
    return user
  }

  async deactivate(id: number): Promise<User> {
    return this.update(id, { isActive: false })
  }
}
