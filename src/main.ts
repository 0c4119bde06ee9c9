// * Transmitter console entry point
// * Reads operator commands from stdin and prints the console log to stdout.
// * COMMANDS:
// * - :connect <port> [variant]   open the port (variant defaults to TX_CONSOLE_VARIANT)
// * - :disconnect                 close the port
// * - :all                        push every setting in the snapshot
// * - :set <param> <value>        clamped, formatted `set` for the current variant
// * - :reset                      restore the variant's default settings (not sent)
// * - :clear                      clear the log and status panel
// * - :quit                       disconnect and exit
// * - anything else               sent verbatim to the transmitter

import { createPinia, setActivePinia } from 'pinia'
import { createInterface } from 'readline'
import { watch } from 'vue'

import { loadConsoleConfig } from './services/config'
import { createLogger, setupLogService } from './services/log'
import { TransmitterConsole } from './services/transmitter-console'
import { isProtocolVariantId, isSetParamName, parseNumericInput, ValidationError } from './services/transmitter-protocol'
import { useTransmitterStore } from './stores/transmitter'
import type { LogEntry } from './types/transmitter'

const PREFIXES: Record<LogEntry['kind'], string> = {
  recv: '',
  sent: '',
  error: '!! ',
  info: '-- ',
}

/**
 *
 */
async function main(): Promise<void> {
  const result = loadConsoleConfig(process.env)
  if (!result.success) {
    console.error(result.error)
    process.exitCode = 1
    return
  }
  const { config } = result

  setupLogService(config.logLevel)
  const logger = createLogger('Main')

  setActivePinia(createPinia())
  const store = useTransmitterStore()
  store.applyVariant(config.variant)

  const txConsole = new TransmitterConsole(store, {
    baudRate: config.baudRate,
    pollIntervalMs: config.pollIntervalMs,
  })

  let printed = 0
  watch(
    () => (store.logEntries.length > 0 ? store.logEntries[store.logEntries.length - 1].id : 0),
    (lastId) => {
      for (const entry of store.logEntries) {
        if (entry.id > printed) {
          process.stdout.write(`${PREFIXES[entry.kind]}${entry.text}\n`)
        }
      }
      printed = lastId
    },
    { flush: 'sync' }
  )

  txConsole.start()
  if (config.port) {
    await txConsole.connect(config.port, config.variant)
  }

  const rl = createInterface({ input: process.stdin })
  let closing = false

  const quit = async (): Promise<void> => {
    if (closing) {
      return
    }
    closing = true
    rl.close()
    await txConsole.shutdown()
    logger.info('Console stopped')
  }

  process.on('SIGINT', () => {
    quit().catch((error: unknown) => logger.error('Shutdown failed:', error))
  })

  for await (const input of rl) {
    const [command, ...args] = input.trim().split(/\s+/)

    if (command === ':quit') {
      break
    } else if (command === ':connect') {
      const [port, variantText = config.variant] = args
      if (!port) {
        store.appendLog('error', 'usage: :connect <port> [sx1280-tx|sx1280-jitter]')
      } else if (!isProtocolVariantId(variantText)) {
        store.appendLog('error', `Unknown variant '${variantText}'`)
      } else {
        await txConsole.connect(port, variantText)
      }
    } else if (command === ':disconnect') {
      await txConsole.disconnect()
    } else if (command === ':all') {
      await txConsole.sendAll()
    } else if (command === ':reset') {
      store.resetSnapshot()
      store.appendLog('info', `Settings reset to ${store.variantId} defaults; :all sends them`)
    } else if (command === ':clear') {
      store.clearLog()
    } else if (command === ':set') {
      const [name = '', valueText = ''] = args
      if (!isSetParamName(name)) {
        store.appendLog('error', `Unknown parameter '${name}'`)
        continue
      }
      try {
        await txConsole.setParam(name, parseNumericInput(valueText, name))
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error
        }
        store.appendLog('error', error.message)
      }
    } else {
      await txConsole.sendManual(input)
    }
  }

  await quit()
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
