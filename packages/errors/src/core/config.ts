import { z } from "zod"

const errorsConfigSchema = z.object({
  /** Frames kept per stack capture, after the skipped ones. */
  stackFrameLimit: z.number().int().positive(),

  /** Upper bound on the number of links followed when walking a cause chain. */
  maxChainDepth: z.number().int().positive(),
})

export type ErrorsConfig = Readonly<z.infer<typeof errorsConfigSchema>>

export const DEFAULTS: ErrorsConfig = Object.freeze({
  stackFrameLimit: 50,
  maxChainDepth: 50,
})

let current: ErrorsConfig = DEFAULTS

export function getErrorsConfig(): ErrorsConfig {
  return current
}

/**
 * Validates and applies a partial settings update for this package.
 * Keys left undefined keep their current value.
 *
 * @throws Error when the merged settings fail validation; nothing is applied.
 */
export function configureErrors(patch: Partial<ErrorsConfig>): ErrorsConfig {
  const merged: Record<string, unknown> = { ...current }

  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) merged[key] = value
  }

  const result = errorsConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Errors configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  current = Object.freeze(result.data)

  return current
}

export function resetErrorsConfig(): ErrorsConfig {
  current = DEFAULTS

  return current
}
