/**
 * Role Controller
 *
 * Role permissions come from the service catalog (`roles_*`); the slug
 * aliases let the dotted spelling match them.
 *
 * @packageDocumentation
 */

import type { Role } from "../contracts/types.js"
import type { Authorizer } from "../resource/base-controller.js"
import {
  ResourceController,
  type ControllerSettings,
} from "../resource/resource-controller.js"
import type { RoleService } from "./service.js"

export class RoleController extends ResourceController<Role> {
  constructor(
    service: RoleService,
    authorizer?: Authorizer,
    settings: ControllerSettings = {},
  ) {
    super(service, {
      resourceType: "roles",
      title: "Role",
      permissions: {
        index: "roles.read",
        show: "roles.view",
        store: "roles.create",
        update: "roles.update",
        delete: "roles.delete",
      },
      authorizer,
      ...settings,
    })
  }
}
