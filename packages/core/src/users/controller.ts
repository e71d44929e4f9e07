/**
 * User Controller
 *
 * @packageDocumentation
 */

import type { User } from "../contracts/types.js"
import type { Authorizer } from "../resource/base-controller.js"
import {
  ResourceController,
  type ControllerSettings,
} from "../resource/resource-controller.js"
import type { UserService } from "./service.js"

export class UserController extends ResourceController<User> {
  constructor(
    service: UserService,
    authorizer?: Authorizer,
    settings: ControllerSettings = {},
  ) {
    super(service, {
      resourceType: "users",
      title: "User",
      authorizer,
      ...settings,
    })
  }
}
