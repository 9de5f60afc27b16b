import { describe, it, expect } from 'vitest'
import { decodeManifest } from './decode.js'
import { LB_WEB_APP_TYPE } from './schema.js'
import { MalformedManifestError, UnsupportedManifestTypeError } from '../errors.js'

const frontendManifest = `
name: frontend
type: Load Balanced Web App
image:
  build: frontend/Dockerfile
  port: 80
http:
  path: '/'
cpu: 256
memory: 512
count: 1
variables:
  LOG_LEVEL: info
environments:
  prod:
    count: 3
    http:
      path: '/app/*'
`

describe('decodeManifest', () => {
  it('should decode a load balanced web app', () => {
    const manifest = decodeManifest(frontendManifest)

    expect(manifest).toEqual({
      name: 'frontend',
      type: LB_WEB_APP_TYPE,
      image: { build: 'frontend/Dockerfile', port: 80 },
      http: { path: '/' },
      cpu: 256,
      memory: 512,
      count: 1,
      variables: { LOG_LEVEL: 'info' },
      environments: {
        prod: { count: 3, http: { path: '/app/*' } },
      },
    })
  })

  it('should accept raw bytes', () => {
    const manifest = decodeManifest(new TextEncoder().encode(frontendManifest))

    expect(manifest.name).toBe('frontend')
  })

  it('should default the routing path to a catch-all', () => {
    const manifest = decodeManifest(`
name: frontend
type: Load Balanced Web App
image:
  port: 80
cpu: 256
memory: 512
count: 1
`)

    expect(manifest.http).toEqual({ path: '*' })
    expect(manifest.environments).toBeUndefined()
  })

  it('should reject an unknown manifest type', () => {
    const raw = 'name: worker\ntype: Scheduled Job\n'

    expect(() => decodeManifest(raw)).toThrow(UnsupportedManifestTypeError)
    expect(() => decodeManifest(raw)).toThrow(
      'Manifest type "Scheduled Job" is not supported. Supported types: Load Balanced Web App'
    )
  })

  it('should reject a manifest without a type', () => {
    expect(() => decodeManifest('name: frontend\n')).toThrow(
      'Manifest is missing the "type" field'
    )
  })

  it('should reject invalid YAML', () => {
    expect(() => decodeManifest('name: [frontend\n')).toThrow(MalformedManifestError)
  })

  it('should reject a document that is not a mapping', () => {
    expect(() => decodeManifest('- frontend\n- backend\n')).toThrow(
      'Manifest must be a mapping of fields'
    )
  })

  it('should list every schema problem with its path', () => {
    const raw = `
name: frontend
type: Load Balanced Web App
image:
  port: 80
cpu: 256
memory: lots
`

    expect(() => decodeManifest(raw)).toThrow(
      'Invalid Load Balanced Web App manifest: memory: Expected number, received string; count: Required'
    )
  })

  it('should reject unknown fields', () => {
    const raw = `
name: frontend
type: Load Balanced Web App
image:
  port: 80
cpu: 256
memory: 512
count: 1
replicas: 2
`

    expect(() => decodeManifest(raw)).toThrow(MalformedManifestError)
  })
})
