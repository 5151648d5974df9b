import { z } from 'zod'

const PositiveInt = z.coerce.number().int().positive()

/** Options every command sees through `optsWithGlobals()`. */
const GlobalOptionsSchema = z.object({
  url: z.string().optional(),
  token: z.string().optional(),
  password: z.string().optional(),
  config: z.string().optional(),
  demo: z.boolean().optional(),
  json: z.boolean().optional(),
  timeout: PositiveInt.optional(),
  replyTimeout: PositiveInt.optional(),
})

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>

export function parseGlobalOptions(raw: Record<string, unknown>): GlobalOptions {
  const result = GlobalOptionsSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const name = issue?.path.join('.') ?? 'option'
    throw new Error(`Invalid --${name}: ${issue?.message ?? 'unrecognized value'}`)
  }
  return result.data
}
