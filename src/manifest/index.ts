/**
 * Manifest — public API
 */
export type {
  AppManifest,
  AppType,
  LBWebAppManifest,
  LBWebAppOverride,
  LBWebAppConfig,
} from './schema.js'

export { APP_TYPES, LB_WEB_APP_TYPE, isAppType } from './schema.js'

export { decodeManifest } from './decode.js'
