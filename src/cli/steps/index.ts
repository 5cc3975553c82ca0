/**
 * Pipeline Steps
 *
 * Reusable steps shared by the CLI commands.
 */

export { initContext, resolveSettings } from './context'
export { stepParse } from './parse'
