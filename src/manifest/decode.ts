import { parse as parseYaml } from 'yaml'
import type { ZodIssue } from 'zod'
import { MalformedManifestError, UnsupportedManifestTypeError, describeError } from '../errors.js'
import { APP_TYPES, isAppType, manifestSchemas, type AppManifest } from './schema.js'

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)'
  return `${location}: ${issue.message}`
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Decode a serialized manifest into its typed variant.
 *
 * The `type` field selects the variant; the rest of the document is validated
 * against that variant's schema.
 *
 * @throws MalformedManifestError if the document is not valid YAML or fails validation
 * @throws UnsupportedManifestTypeError if `type` names no known application shape
 */
export function decodeManifest(raw: string | Uint8Array): AppManifest {
  const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf-8')

  let document: unknown
  try {
    document = parseYaml(text)
  } catch (error) {
    throw new MalformedManifestError(`Manifest is not valid YAML: ${describeError(error)}`, error)
  }

  if (!isMapping(document)) {
    throw new MalformedManifestError('Manifest must be a mapping of fields')
  }

  const { type } = document
  if (typeof type !== 'string' || type.length === 0) {
    throw new MalformedManifestError('Manifest is missing the "type" field')
  }
  if (!isAppType(type)) {
    throw new UnsupportedManifestTypeError(type, APP_TYPES)
  }

  const result = manifestSchemas[type].safeParse(document)
  if (!result.success) {
    const problems = result.error.issues.map(formatIssue).join('; ')
    throw new MalformedManifestError(`Invalid ${type} manifest: ${problems}`, result.error)
  }
  return result.data
}
