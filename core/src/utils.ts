/**
 * Namespaced debug logging.
 *
 * Enable with VAULT_BANK_DEBUG=bank,executor (or "*" for everything).
 */

const ENABLED = (process.env.VAULT_BANK_DEBUG ?? '')
  .split(',')
  .map(s => s.trim())
  .filter(s => s.length > 0)

export function isDebugEnabled(ns: string): boolean {
  return ENABLED.includes('*') || ENABLED.includes(ns)
}

export function debug(ns: string, ...args: unknown[]): void {
  if (isDebugEnabled(ns)) {
    console.log(`[${new Date().toISOString()}] [${ns}]`, ...args)
  }
}
