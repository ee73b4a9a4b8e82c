import { pino, type Logger } from 'pino'

const root = pino({
  name: 'cabin-calendar',
  level: process.env.LOG_LEVEL ?? (process.env.VITEST ? 'silent' : 'info'),
})

/** Child logger tagged with the component name, e.g. `createLogger('publisher')` */
export function createLogger(component: string): Logger {
  return root.child({ component })
}

export type { Logger }
