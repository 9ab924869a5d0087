import { ManagedRuntime } from 'effect'

import { loadConfig } from '~/config'
import { OperatorConfigError } from '~/errors'
import { logger } from '~/logger'
import { getOperatorHealthEffect, makeOperatorLayer, startOperatorEffect } from '~/operator/operator'
import { createOperatorParts } from '~/operator/parts'

const main = async () => {
  const config = loadConfig()
  const runtime = ManagedRuntime.make(makeOperatorLayer(() => createOperatorParts(config)))

  let shuttingDown = false
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info({ signal }, 'shutting down')
    await runtime.dispose()
    process.exit(0)
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, 'shutdown failed')
        process.exit(1)
      })
    })
  }

  await runtime.runPromise(startOperatorEffect)
  logger.info(await runtime.runPromise(getOperatorHealthEffect), 'meshsync started')
}

main().catch((error: unknown) => {
  if (error instanceof OperatorConfigError) {
    logger.fatal({ error: error.message }, 'invalid configuration')
  } else {
    logger.fatal({ err: error }, 'meshsync failed to start')
  }
  process.exit(1)
})
