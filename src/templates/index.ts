/**
 * Stack Template System — public API
 */
export type { AppTemplate } from './schema.js'
export type { TemplateStore } from './store.js'
export type { LBWebAppTemplateParameters } from './definitions/index.js'

export { getAppTemplate, getAllAppTemplates } from './registry.js'
export { BundledTemplateStore, BUNDLED_TEMPLATES_DIR } from './store.js'
export { TemplateRenderer } from './renderer.js'
export { LB_WEB_APP_PARAM_KEYS } from './definitions/index.js'
