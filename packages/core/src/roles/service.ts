/**
 * Role Service
 *
 * Roles are deactivated rather than deleted so existing assignments keep
 * their history.
 *
 * @packageDocumentation
 */

import { InvalidArgumentError, NotFoundError } from "../contracts/errors.js"
import type { RecordInput } from "../contracts/service.js"
import type { ResourceConfig, Role } from "../contracts/types.js"
import type { SqliteDatabase } from "../persistence/database.js"
import {
  SqliteRepository,
  type Repository,
} from "../persistence/repository.js"
import { ResourceService } from "../resource/resource-service.js"
import {
  ROLE_RESOURCE,
  ROLE_TABLE,
  type CreateRoleInput,
  type UpdateRoleInput,
} from "./definition.js"

export class RoleService extends ResourceService<
  Role,
  CreateRoleInput,
  UpdateRoleInput
> {
  constructor(repository: Repository<Role>, config?: Partial<ResourceConfig>) {
    super(repository, ROLE_RESOURCE, config)
  }

  static fromDatabase(
    db: SqliteDatabase,
    config?: Partial<ResourceConfig>,
  ): RoleService {
    return new RoleService(new SqliteRepository(db, ROLE_TABLE), config)
  }

  async getBySlug(slug: string): Promise<Role> {
    const role = await this.repository.findOne([
      { column: "slug", operator: "=", value: slug },
    ])
    if (!role) {
      throw new NotFoundError(`Role with slug ${slug} not found`)
    }
    return role
  }

  /**
   * A role may not become its own ancestor. The chain is walked from the
   * proposed parent before anything is written.
   */
  override async update(id: number, data: RecordInput): Promise<Role> {
    await this.getById(id)
    if (typeof data.parentId === "number") {
      await this.assertNoCycle(id, data.parentId)
    }
    return super.update(id, data)
  }

  private async assertNoCycle(id: number, parentId: number): Promise<void> {
    if (parentId === id) {
      throw new InvalidArgumentError("a role cannot be its own parent", "parentId")
    }
    const visited = new Set<number>()
    let current: number | null = parentId
    while (current !== null && !visited.has(current)) {
      if (current === id) {
        throw new InvalidArgumentError(
          "parentId would create a cycle in the role hierarchy",
          "parentId",
        )
      }
      visited.add(current)
      const ancestor: Role | undefined = await this.repository.find(current)
      current = ancestor ? ancestor.parent_id : null
    }
  }

  override async delete(id: number): Promise<void> {
    await this.getById(id)
    await this.repository.update(id, { is_active: 0 })
  }
}
