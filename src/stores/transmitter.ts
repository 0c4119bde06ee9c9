/**
 * Pinia store for the transmitter console.
 *
 * Holds what the display layer renders: connection status, the console log, the status
 * panel lines and the optimistic mirror of the device configuration. The snapshot is
 * not authoritative; it reflects what was last sent, and is reconciled only by asking
 * the device with `get`.
 */

import { defineStore } from 'pinia'
import { computed, ref } from 'vue'

import { DEFAULT_VARIANT_ID, isStatusLine, PROTOCOL_VARIANTS } from '@/services/transmitter-protocol'
import {
  ConnectionState,
  type DeviceConfigSnapshot,
  type LogEntry,
  type LogKind,
  type ProtocolVariantId,
} from '@/types/transmitter'

export const MAX_LOG_ENTRIES = 2000
export const MAX_STATUS_LINES = 500

/**
 * Fresh copy of a variant's defaults.
 * @param variantId
 */
function defaultSnapshot(variantId: ProtocolVariantId): DeviceConfigSnapshot {
  return { ...PROTOCOL_VARIANTS[variantId].defaults }
}

export const useTransmitterStore = defineStore('transmitter', () => {
  const connectionState = ref<ConnectionState>(ConnectionState.DISCONNECTED)
  const port = ref<string | null>(null)
  const sessionId = ref<string | null>(null)
  const variantId = ref<ProtocolVariantId>(DEFAULT_VARIANT_ID)
  const snapshot = ref<DeviceConfigSnapshot>(defaultSnapshot(DEFAULT_VARIANT_ID))

  const logEntries = ref<LogEntry[]>([])
  const statusLines = ref<string[]>([])
  let nextLogId = 1

  const isConnected = computed(() => connectionState.value === ConnectionState.CONNECTED)
  const variant = computed(() => PROTOCOL_VARIANTS[variantId.value])

  /**
   * Append a console line; 'CFG:', '===' and 'Status:' lines also go to the status panel.
   * @param kind
   * @param text
   */
  function appendLog(kind: LogKind, text: string): void {
    logEntries.value.push({ id: nextLogId++, kind, text, timestamp: new Date().toISOString() })
    if (logEntries.value.length > MAX_LOG_ENTRIES) {
      logEntries.value.splice(0, logEntries.value.length - MAX_LOG_ENTRIES)
    }

    if (isStatusLine(text)) {
      statusLines.value.push(text)
      if (statusLines.value.length > MAX_STATUS_LINES) {
        statusLines.value.splice(0, statusLines.value.length - MAX_STATUS_LINES)
      }
    }
  }

  /**
   *
   * @param state
   * @param connectedPort
   * @param connectedSessionId
   */
  function setConnection(
    state: ConnectionState,
    connectedPort: string | null = port.value,
    connectedSessionId: string | null = sessionId.value
  ): void {
    connectionState.value = state
    port.value = connectedPort
    sessionId.value = connectedSessionId
  }

  /**
   * Switch firmware variant. The snapshot is reset to that variant's defaults when the
   * variant actually changes.
   * @param id
   */
  function applyVariant(id: ProtocolVariantId): void {
    if (id === variantId.value) {
      return
    }
    variantId.value = id
    snapshot.value = defaultSnapshot(id)
  }

  /**
   * Record an optimistic change.
   * @param patch
   */
  function patchSnapshot(patch: Partial<DeviceConfigSnapshot>): void {
    Object.assign(snapshot.value, patch)
  }

  /**
   *
   */
  function resetSnapshot(): void {
    snapshot.value = defaultSnapshot(variantId.value)
  }

  /**
   *
   */
  function clearLog(): void {
    logEntries.value = []
    statusLines.value = []
  }

  return {
    connectionState,
    port,
    sessionId,
    variantId,
    snapshot,
    logEntries,
    statusLines,
    isConnected,
    variant,
    appendLog,
    setConnection,
    applyVariant,
    patchSnapshot,
    resetSnapshot,
    clearLog,
  }
})

export type TransmitterStore = ReturnType<typeof useTransmitterStore>
