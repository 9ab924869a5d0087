import pino, { type Logger, multistream } from 'pino'
import { pinoLoki } from 'pino-loki'

export type { Logger }

const level = process.env.LOG_LEVEL ?? 'info'
const service = process.env.MESHSYNC_SERVICE_NAME ?? 'meshsync'
const namespace = process.env.POD_NAMESPACE ?? 'default'
const lokiEndpoint = process.env.MESHSYNC_LOKI_ENDPOINT
const lokiBasicAuth = parseLokiBasicAuth(process.env.MESHSYNC_LOKI_BASIC_AUTH)

const destinations: { stream: NodeJS.WritableStream }[] = [{ stream: process.stdout }]

if (lokiEndpoint) {
  try {
    destinations.push({
      stream: pinoLoki({
        host: lokiEndpoint,
        batching: true,
        interval: 5,
        timeout: 5000,
        replaceTimestamp: true,
        labels: { service, namespace },
        basicAuth: lokiBasicAuth,
      }),
    })
  } catch (error) {
    console.warn('failed to initialise pino-loki transport', error)
  }
}

export const logger = pino(
  {
    level,
    base: { service, namespace },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  multistream(destinations),
)

export const componentLogger = (component: string, parent: Logger = logger) => parent.child({ component })

function parseLokiBasicAuth(value?: string) {
  if (!value) {
    return undefined
  }
  const decoded = value.includes(':') ? value : Buffer.from(value, 'base64').toString('utf8')
  const [username, ...rest] = decoded.split(':')
  const password = rest.join(':')
  if (!username || !password) {
    return undefined
  }
  return { username, password }
}
