export { lbWebApp, LB_WEB_APP_PARAM_KEYS } from './lb-web-app.js'
export type { LBWebAppTemplateParameters } from './lb-web-app.js'
