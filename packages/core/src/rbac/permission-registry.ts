/**
 * Permission Registry
 *
 * Declares, per resource, which standard and custom permissions exist.
 *
 * @packageDocumentation
 */

import type { PermissionDefinition } from "../contracts/types.js"

export const STANDARD_PERMISSIONS = [
  "create",
  "read",
  "update",
  "delete",
  "export",
  "bulk_delete",
  "bulk_edit",
  "custom",
] as const

export type StandardPermission = (typeof STANDARD_PERMISSIONS)[number]

export interface CustomPermission {
  name: string
  slug: string
  description: string
}

export interface ResourcePermissionConfig {
  resource: string
  display_name: string
  category: string
  enabled_permissions: StandardPermission[]
  custom_permissions: CustomPermission[]
}

export function generatePermissionSlug(
  resource: string,
  permission: StandardPermission,
): string {
  return `${resource}.${permission}`
}

export function generateCustomPermissionSlug(
  resource: string,
  customSlug: string,
): string {
  return `${resource}.${customSlug}`
}

const STANDARD_DISPLAY: Record<StandardPermission, string> = {
  create: "Create",
  read: "Read",
  update: "Update",
  delete: "Delete",
  export: "Export",
  bulk_delete: "Bulk Delete",
  bulk_edit: "Bulk Edit",
  custom: "Custom",
}

export class PermissionRegistry {
  private resources = new Map<string, ResourcePermissionConfig>()

  registerResource(config: ResourcePermissionConfig): void {
    this.resources.set(config.resource, config)
  }

  getResource(resource: string): ResourcePermissionConfig | undefined {
    return this.resources.get(resource)
  }

  getAllResources(): ResourcePermissionConfig[] {
    return [...this.resources.values()]
  }

  /**
   * Enabled standard slugs followed by custom slugs. `custom` is a marker
   * for "has custom permissions", not a permission of its own.
   */
  getPermissionSlugs(resource: string): string[] {
    const config = this.resources.get(resource)
    if (!config) return []
    return [
      ...config.enabled_permissions
        .filter((p) => p !== "custom")
        .map((p) => generatePermissionSlug(resource, p)),
      ...config.custom_permissions.map((c) =>
        generateCustomPermissionSlug(resource, c.slug),
      ),
    ]
  }

  /**
   * Catalog rows for every registered permission
   */
  toDefinitions(): PermissionDefinition[] {
    return this.getAllResources().flatMap((config) => [
      ...config.enabled_permissions
        .filter((p) => p !== "custom")
        .map((p) => ({
          name: `${STANDARD_DISPLAY[p]} ${config.display_name}`,
          slug: generatePermissionSlug(config.resource, p),
          category: config.category,
          resource: config.resource,
          action: p,
          description: `${STANDARD_DISPLAY[p]} ${config.resource}`,
        })),
      ...config.custom_permissions.map((c) => ({
        name: c.name,
        slug: generateCustomPermissionSlug(config.resource, c.slug),
        category: config.category,
        resource: config.resource,
        action: c.slug,
        description: c.description,
      })),
    ])
  }
}

/**
 * Registry with the application's own resources
 */
export function defaultPermissionRegistry(): PermissionRegistry {
  const registry = new PermissionRegistry()
  registry.registerResource({
    resource: "books",
    display_name: "Books",
    category: "books",
    enabled_permissions: ["create", "read", "update", "delete", "export", "custom"],
    custom_permissions: [
      { name: "Borrow Books", slug: "borrow", description: "Borrow books" },
      { name: "Return Books", slug: "return", description: "Return books" },
    ],
  })
  registry.registerResource({
    resource: "users",
    display_name: "Users",
    category: "users",
    enabled_permissions: ["create", "read", "update", "delete", "export"],
    custom_permissions: [],
  })
  registry.registerResource({
    resource: "roles",
    display_name: "Roles",
    category: "roles",
    enabled_permissions: ["create", "read", "update", "delete"],
    custom_permissions: [],
  })
  return registry
}
