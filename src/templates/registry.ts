/**
 * Stack Template Registry
 *
 * Static, code-defined map from manifest type to stack definition.
 * Supporting a new application shape means adding its manifest schema,
 * a definition under ./definitions and an entry here.
 */

import { LB_WEB_APP_TYPE, type AppManifest, type AppType } from '../manifest/index.js'
import type { AppTemplate } from './schema.js'
import { lbWebApp } from './definitions/index.js'

// ─── Registry ────────────────────────────────────────────────────

const appTemplates = {
  [LB_WEB_APP_TYPE]: lbWebApp,
} satisfies { [T in AppType]: AppTemplate<Extract<AppManifest, { type: T }>, object> }

// ─── Public API ──────────────────────────────────────────────────

/**
 * Get the stack definition of a manifest type.
 */
export function getAppTemplate<T extends AppType>(type: T): (typeof appTemplates)[T] {
  return appTemplates[type]
}

/**
 * Get all stack definitions.
 */
export function getAllAppTemplates(): Array<(typeof appTemplates)[AppType]> {
  return Object.values(appTemplates)
}
