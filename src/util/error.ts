import { z } from "zod"

/**
 * Base class for errors that carry a name and zod-described data.
 *
 * Subclasses are created with {@link NamedError.create} rather than
 * declared by hand, so every error has a schema and serializes the same way.
 */
export abstract class NamedError extends Error {
  abstract schema(): z.ZodTypeAny
  abstract toObject(): { name: string; data: unknown }

  static create<Name extends string, Data extends z.ZodTypeAny>(name: Name, data: Data) {
    const schema = z.object({
      name: z.literal(name),
      data,
    })

    const result = class extends NamedError {
      public static readonly Schema = schema

      public override readonly name: Name = name

      constructor(
        public readonly data: z.input<Data>,
        options?: ErrorOptions,
      ) {
        super(messageOf(data) ?? name, options)
      }

      static isInstance<T extends abstract new (...args: never[]) => unknown>(
        this: T,
        input: unknown,
      ): input is InstanceType<T> {
        return typeof input === "object" && input !== null && "name" in input && input.name === name
      }

      schema() {
        return schema
      }

      toObject() {
        return {
          name: name,
          data: this.data,
        }
      }
    }
    Object.defineProperty(result, "name", { value: name })
    return result
  }

  public static readonly Unknown = NamedError.create(
    "UnknownError",
    z.object({
      message: z.string(),
    }),
  )
}

function messageOf(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("message" in data)) return undefined
  return typeof data.message === "string" ? data.message : undefined
}
