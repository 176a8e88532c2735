import { z } from "zod"
import type {
  Association,
  AssociationDefinition,
  Entity,
  SchemaDefinition,
} from "../../ports/schema"
import { SqlSchemaError } from "../errors/sql-schema-error"

const associationSchema = z.object({
  kind: z.enum(["belongsTo", "hasMany", "hasOne"]),
  target: z.string().min(1),
  foreignKey: z.string().min(1).optional(),
})

const entitySchema = z.object({
  table: z.string().min(1),
  primaryKey: z.string().min(1).default("id"),
  associations: z.record(z.string().min(1), associationSchema).default({}),
})

const schemaDefinitionSchema = z.record(z.string().min(1), entitySchema)

export class Schema {
  constructor(private readonly entities: ReadonlyMap<string, Entity>) {}

  /**
   * @throws SqlSchemaError if no entity is registered under `name`.
   */
  entity(name: string): Entity {
    const entity = this.entities.get(name)

    if (!entity) {
      throw new SqlSchemaError(`Unknown entity "${name}"`, {
        entity: name,
        known: this.entityNames(),
      })
    }

    return entity
  }

  /**
   * @throws SqlSchemaError if `owner` or its association is unknown.
   */
  association(owner: string, name: string): Association {
    const association = this.entity(owner).associations.get(name)

    if (!association) {
      throw new SqlSchemaError(`Entity "${owner}" has no association "${name}"`, {
        entity: owner,
        association: name,
      })
    }

    return association
  }

  entityNames(): string[] {
    return [...this.entities.keys()]
  }
}

/**
 * Validate entity and association definitions and resolve their defaults.
 *
 * @example
 * ```ts
 * const schema = defineSchema({
 *   User: { table: "users", associations: { posts: hasMany("Post") } },
 *   Post: { table: "posts", associations: { user: belongsTo("User") } },
 * })
 * ```
 *
 * @throws SqlSchemaError when the definition is malformed or an association
 * targets an unknown entity.
 */
export function defineSchema(definition: SchemaDefinition): Schema {
  const parsed = schemaDefinitionSchema.safeParse(definition)

  if (!parsed.success) {
    throw new SqlSchemaError(`Invalid schema definition:\n${z.prettifyError(parsed.error)}`)
  }

  const entities = new Map<string, Entity>()

  for (const [name, entity] of Object.entries(parsed.data)) {
    const associations = new Map<string, Association>()

    for (const [assocName, assoc] of Object.entries(entity.associations)) {
      if (!(assoc.target in parsed.data)) {
        throw new SqlSchemaError(
          `Association ${name}.${assocName} targets unknown entity "${assoc.target}"`,
          { entity: name, association: assocName, target: assoc.target },
        )
      }

      associations.set(assocName, {
        name: assocName,
        kind: assoc.kind,
        owner: name,
        target: assoc.target,
        foreignKey:
          assoc.foreignKey ??
          `${snakeCase(assoc.kind === "belongsTo" ? assoc.target : name)}_id`,
      })
    }

    entities.set(name, {
      name,
      table: entity.table,
      primaryKey: entity.primaryKey,
      associations,
    })
  }

  return new Schema(entities)
}

export function belongsTo(target: string, options: { foreignKey?: string } = {}): AssociationDefinition {
  return { kind: "belongsTo", target, ...options }
}

export function hasMany(target: string, options: { foreignKey?: string } = {}): AssociationDefinition {
  return { kind: "hasMany", target, ...options }
}

export function hasOne(target: string, options: { foreignKey?: string } = {}): AssociationDefinition {
  return { kind: "hasOne", target, ...options }
}

function snakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase()
}
