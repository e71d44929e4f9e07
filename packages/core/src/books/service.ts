/**
 * Book Service
 *
 * Catalog CRUD plus the borrow/return status transitions.
 *
 * @packageDocumentation
 */

import { ConflictError, NotFoundError } from "../contracts/errors.js"
import type {
  Book,
  BookStatus,
  ListRequestInput,
  PaginatedResult,
  ResourceConfig,
} from "../contracts/types.js"
import type { SqliteDatabase } from "../persistence/database.js"
import {
  SqliteRepository,
  type Repository,
} from "../persistence/repository.js"
import { ResourceService } from "../resource/resource-service.js"
import {
  BOOK_RESOURCE,
  BOOK_TABLE,
  type CreateBookInput,
  type UpdateBookInput,
} from "./definition.js"

export class BookService extends ResourceService<
  Book,
  CreateBookInput,
  UpdateBookInput
> {
  constructor(repository: Repository<Book>, config?: Partial<ResourceConfig>) {
    super(repository, BOOK_RESOURCE, config)
  }

  static fromDatabase(
    db: SqliteDatabase,
    config?: Partial<ResourceConfig>,
  ): BookService {
    return new BookService(new SqliteRepository(db, BOOK_TABLE), config)
  }

  async getByIsbn(isbn: string): Promise<Book> {
    const book = await this.repository.findOne([
      { column: "isbn", operator: "=", value: isbn.trim() },
    ])
    if (!book) {
      throw new NotFoundError(`Book with ISBN ${isbn} not found`)
    }
    return book
  }

  async getByAuthor(
    author: string,
    request: ListRequestInput,
  ): Promise<PaginatedResult<Book>> {
    return this.getListAdvanced(request, { ...request.filters, author })
  }

  async getAvailable(request: ListRequestInput): Promise<PaginatedResult<Book>> {
    return this.getListAdvanced(request, {
      ...request.filters,
      status: "AVAILABLE",
    })
  }

  /**
   * AVAILABLE -> BORROWED
   */
  async borrowBook(id: number): Promise<Book> {
    const book = await this.getById(id)
    if (book.status !== "AVAILABLE") {
      throw new ConflictError("book is not available for borrowing")
    }
    return this.setStatus(id, "BORROWED")
  }

  /**
   * BORROWED -> AVAILABLE
   */
  async returnBook(id: number): Promise<Book> {
    const book = await this.getById(id)
    if (book.status !== "BORROWED") {
      throw new ConflictError("book is not currently borrowed")
    }
    return this.setStatus(id, "AVAILABLE")
  }

  private async setStatus(id: number, status: BookStatus): Promise<Book> {
    const updated = await this.repository.update(id, { status })
    if (!updated) {
      throw this.notFound(id)
    }
    return updated
  }
}
