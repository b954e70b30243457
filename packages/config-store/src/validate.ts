import { z } from 'zod'

import { configDocumentSchema, getPath } from './document.js'
import type {
  ConfigFieldSpec,
  ConfigSchema,
  ConfigValue,
  FieldError,
  ValidationResult,
} from './types.js'

function stringValidator(field: ConfigFieldSpec): z.ZodType<unknown> {
  let schema = z.string({ invalid_type_error: 'expected a string' })
  if (field.pattern !== undefined) {
    schema = schema.regex(new RegExp(field.pattern), `must match ${field.pattern}`)
  }
  const allowed = field.enum
  if (allowed) {
    return schema.refine((value) => allowed.includes(value), {
      message: `must be one of: ${allowed.join(', ')}`,
    })
  }
  return schema
}

function numberValidator(field: ConfigFieldSpec, base: z.ZodNumber): z.ZodType<unknown> {
  let schema = base
  if (field.min !== undefined) schema = schema.min(field.min, `must be >= ${field.min}`)
  if (field.max !== undefined) schema = schema.max(field.max, `must be <= ${field.max}`)
  return schema
}

function listOfStrings(): z.ZodArray<z.ZodString> {
  return z.array(z.string({ invalid_type_error: 'expected a list of strings' }), {
    invalid_type_error: 'expected a list of strings',
  })
}

export function fieldValidator(
  field: ConfigFieldSpec,
  boards: ReadonlySet<string>
): z.ZodType<unknown> {
  switch (field.type) {
    case 'string':
      return stringValidator(field)
    case 'integer':
      return numberValidator(
        field,
        z.number({ invalid_type_error: 'expected an integer' }).int('expected an integer')
      )
    case 'number':
      return numberValidator(field, z.number({ invalid_type_error: 'expected a number' }))
    case 'boolean':
      return z.boolean({ invalid_type_error: 'expected a boolean' })
    case 'string-list':
      return listOfStrings()
    case 'board-list':
      return listOfStrings().superRefine((names, ctx) => {
        for (const name of names) {
          if (!boards.has(name)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown board "${name}"` })
          }
        }
      })
  }
}

/** Returns the first reason `value` is unacceptable for `field`, or null. */
export function validateFieldValue(
  field: ConfigFieldSpec,
  value: ConfigValue,
  boards: ReadonlySet<string>
): string | null {
  const result = fieldValidator(field, boards).safeParse(value)
  if (result.success) return null
  return result.error.issues[0]?.message ?? 'invalid value'
}

export function validateDocument(candidate: unknown, schema: ConfigSchema): ValidationResult {
  const shape = configDocumentSchema.safeParse(candidate)
  if (!shape.success) {
    return {
      valid: false,
      errors: shape.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : '(document)',
        reason: issue.message,
      })),
    }
  }

  const boards = new Set(schema.boards)
  const errors: FieldError[] = []
  for (const field of schema.fields) {
    const value = getPath(shape.data.values, field.key)
    if (value === undefined) {
      if (field.required) errors.push({ field: field.key, reason: 'required key is missing' })
      continue
    }
    const reason = validateFieldValue(field, value, boards)
    if (reason) errors.push({ field: field.key, reason })
  }

  return errors.length === 0 ? { valid: true } : { valid: false, errors }
}
