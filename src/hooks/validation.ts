import { z } from 'zod'
import { InvalidRegistrationError } from '../errors.js'
import type { HookFunction, ImplementationFailureHandler } from './types.js'

const HookNameSchema = z.string({ error: 'hook name must be a string' }).min(1, 'hook name must not be empty')

const OwnerIdSchema = z.string({ error: 'owner id must be a string' }).min(1, 'owner id must not be empty')

const CallableSchema = z.custom<HookFunction>((value) => typeof value === 'function', 'callable must be a function')

const RegistrationSchema = z.object({
  hookName: HookNameSchema,
  ownerId: OwnerIdSchema,
  callable: CallableSchema,
})

const DispatcherOptionsSchema = z.object({
  defaultOwnerId: OwnerIdSchema.default('default'),
  onImplementationFailure: z
    .custom<ImplementationFailureHandler>(
      (value) => typeof value === 'function',
      'onImplementationFailure must be a function'
    )
    .optional(),
})

export type DispatcherOptions = z.infer<typeof DispatcherOptionsSchema>

function toRegistrationError(prefix: string, error: z.ZodError): InvalidRegistrationError {
  const details = error.issues.map((issue) => issue.message).join('; ')
  return new InvalidRegistrationError(`${prefix}: ${details}`)
}

/**
 * Checks the arguments of a registration call.
 *
 * @throws InvalidRegistrationError if the hook name or owner id is empty, or the callable is not a function
 */
export function validateRegistration(hookName: unknown, callable: unknown, ownerId: unknown): void {
  const result = RegistrationSchema.safeParse({ hookName, ownerId, callable })
  if (!result.success) {
    throw toRegistrationError(`invalid registration for hook '${String(hookName)}'`, result.error)
  }
}

/**
 * Checks an owner id on its own, for helpers that bind one ahead of registration.
 *
 * @returns The validated owner id
 * @throws InvalidRegistrationError if the owner id is not a non-empty string
 */
export function validateOwnerId(ownerId: unknown): string {
  const result = OwnerIdSchema.safeParse(ownerId)
  if (!result.success) {
    throw toRegistrationError('invalid owner id', result.error)
  }
  return result.data
}

/**
 * Validates the scalar dispatcher options and fills in defaults.
 *
 * @throws InvalidRegistrationError if an option has the wrong type
 */
export function parseDispatcherOptions(options: {
  defaultOwnerId?: unknown
  onImplementationFailure?: unknown
}): DispatcherOptions {
  const result = DispatcherOptionsSchema.safeParse(options)
  if (!result.success) {
    throw toRegistrationError('invalid dispatcher configuration', result.error)
  }
  return result.data
}
