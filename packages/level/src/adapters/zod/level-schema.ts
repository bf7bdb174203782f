import { z } from "zod"
import { safeParseLevel } from "../../core/parse-level"

/**
 * Zod schema for a level string, outputting the parsed {@link Level}.
 *
 * @example
 * ```ts
 * const schema = z.object({ LOG_LEVEL: levelSchema.default(Levels.Info) })
 * schema.parse({ LOG_LEVEL: "debug+1" }) // { LOG_LEVEL: -3 }
 * ```
 */
export const levelSchema = z.string().transform((value, ctx) => {
  const result = safeParseLevel(value)

  if (result.success) return result.level

  ctx.addIssue({
    code: "custom",
    message: result.error.message,
    params: { code: result.error.code },
  })

  return z.NEVER
})
