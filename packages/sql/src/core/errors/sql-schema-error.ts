import { LoaderError } from "@batchweave/core"

/**
 * A schema definition is invalid, or a batch key names an entity or
 * association the schema does not know.
 */
export class SqlSchemaError extends LoaderError<"invalid_schema"> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { code: "invalid_schema", context, isOperational: false })
  }
}
