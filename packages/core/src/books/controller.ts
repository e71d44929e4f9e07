/**
 * Book Controller
 *
 * @packageDocumentation
 */

import type { Hono } from "hono"
import type { ResourceContext, ResourceEnv } from "../contracts/controller.js"
import type { Book } from "../contracts/types.js"
import type { Authorizer } from "../resource/base-controller.js"
import {
  ResourceController,
  type ControllerSettings,
} from "../resource/resource-controller.js"
import type { BookService } from "./service.js"

export class BookController extends ResourceController<Book> {
  private books: BookService

  constructor(
    service: BookService,
    authorizer?: Authorizer,
    settings: ControllerSettings = {},
  ) {
    super(service, {
      resourceType: "books",
      title: "Book",
      permissions: {
        borrow: "books.borrow",
        return: "books.return",
      },
      authorizer,
      ...settings,
    })
    this.books = service
  }

  async borrowBook(c: ResourceContext): Promise<Response> {
    return this.handle(c, async () => {
      await this.authorize(c, "borrow")
      const book = await this.books.borrowBook(this.validateId(c))
      return this.successResponse(c, book, "Book borrowed successfully")
    })
  }

  async returnBook(c: ResourceContext): Promise<Response> {
    return this.handle(c, async () => {
      await this.authorize(c, "return")
      const book = await this.books.returnBook(this.validateId(c))
      return this.successResponse(c, book, "Book returned successfully")
    })
  }

  override routes(): Hono<ResourceEnv> {
    const router = super.routes()
    router.post("/:id/borrow", (c) => this.borrowBook(c))
    router.post("/:id/return", (c) => this.returnBook(c))
    return router
  }
}
