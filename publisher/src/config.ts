import { z } from 'zod'
import { fromZodError } from 'zod-validation-error'
import { PublisherConfigError } from './errors.js'

export const FailurePolicy = z.enum(['propagate', 'isolate'])
export type FailurePolicy = z.infer<typeof FailurePolicy>

export const PublisherOptionsSchema = z
  .object({
    /**
     * Names the publisher in log namespaces and failure messages.
     */
    label: z.string().min(1).default('publisher'),
    /**
     * `propagate` lets a throwing callback abort the dispatch pass and reach
     * the caller of `publish`. `isolate` reports the error as a `failure`
     * event and continues with the next subscriber.
     */
    failurePolicy: FailurePolicy.default('propagate'),
  })
  .strict()

export type PublisherOptions = z.output<typeof PublisherOptionsSchema>
export type PublisherOptionsInput = z.input<typeof PublisherOptionsSchema>

/**
 * @throws PublisherConfigError if `input` contains unknown keys or invalid values.
 */
export const parsePublisherOptions = (input: unknown = {}): PublisherOptions => {
  const result = PublisherOptionsSchema.safeParse(input)
  if (!result.success) {
    throw new PublisherConfigError(fromZodError(result.error).message)
  }
  return result.data
}
