import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

import { cloneValue, configValueSchema, setPath } from './document.js'
import {
  FIELD_TYPES,
  type ConfigDocument,
  type ConfigFieldSpec,
  type ConfigSchema,
  type ConfigSection,
} from './types.js'
import { validateFieldValue } from './validate.js'

export const CONFIG_KEY_PATTERN = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern)
    return true
  } catch {
    return false
  }
}

export const fieldSpecSchema = z.object({
  key: z.string().regex(CONFIG_KEY_PATTERN, 'must be a dotted key'),
  type: z.enum(FIELD_TYPES),
  required: z.boolean().optional(),
  default: configValueSchema.optional(),
  enum: z.array(z.string()).min(1).optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  pattern: z
    .string()
    .refine(isValidPattern, { message: 'must be a valid regular expression' })
    .optional(),
  description: z.string().optional(),
})

const schemaFileSchema = z.object({
  fields: z.array(fieldSpecSchema),
  boards: z.array(z.string().min(1)),
})

const BASE_SCHEMA_URL = new URL('../schema/scoreboard.schema.json', import.meta.url)

/**
 * Consistency checks z.object cannot express: unique keys, sane bounds, and
 * defaults that satisfy their own field. `boards` are the names a board-list
 * default may reference.
 */
export function checkFieldSpecs(
  fields: readonly ConfigFieldSpec[],
  boards: Iterable<string>
): string[] {
  const problems: string[] = []
  const known = new Set(boards)
  const seen = new Set<string>()
  for (const field of fields) {
    if (seen.has(field.key)) {
      problems.push(`${field.key}: declared more than once`)
      continue
    }
    seen.add(field.key)
    if (field.min !== undefined && field.max !== undefined && field.min > field.max) {
      problems.push(`${field.key}: min ${field.min} is greater than max ${field.max}`)
    }
    if (field.default !== undefined) {
      const reason = validateFieldValue(field, field.default, known)
      if (reason) problems.push(`${field.key}: default ${reason}`)
    }
  }
  for (const key of seen) {
    const parent = [...seen].find((other) => key.startsWith(`${other}.`))
    if (parent) problems.push(`${key}: nested under value field ${parent}`)
  }
  return problems
}

export function parseSchema(raw: unknown, source: string): ConfigSchema {
  const result = schemaFileSchema.safeParse(raw)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration schema in ${source}: ${details}`)
  }
  const schema: ConfigSchema = result.data
  const problems = checkFieldSpecs(schema.fields, schema.boards)
  if (problems.length > 0) {
    throw new Error(`Invalid configuration schema in ${source}: ${problems.join('; ')}`)
  }
  return schema
}

export function loadBaseSchema(file: string | URL = BASE_SCHEMA_URL): ConfigSchema {
  const source = typeof file === 'string' ? file : fileURLToPath(file)
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new Error(`Unable to read configuration schema ${source}: ${message}`)
  }
  return parseSchema(raw, source)
}

export function buildDefaults(fields: readonly ConfigFieldSpec[]): ConfigSection {
  const values: ConfigSection = {}
  for (const field of fields) {
    if (field.default === undefined) continue
    setPath(values, field.key, cloneValue(field.default))
  }
  return values
}

export function defaultDocument(schema: ConfigSchema): ConfigDocument {
  return { revision: 0, values: buildDefaults(schema.fields), plugins: {} }
}

export interface SchemaExtension {
  fields: readonly ConfigFieldSpec[]
  boards: readonly string[]
}

export function extendSchema(
  base: ConfigSchema,
  extensions: readonly SchemaExtension[]
): ConfigSchema {
  const fields = [...base.fields]
  const boards = [...base.boards]
  for (const extension of extensions) {
    fields.push(...extension.fields)
    for (const board of extension.boards) {
      if (!boards.includes(board)) boards.push(board)
    }
  }
  return { fields, boards }
}
