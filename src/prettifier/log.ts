/**
 * Synchronous logging through Effect's logger for the non-Effect core.
 */
import { Effect } from 'effect'

type LogFields = Record<string, unknown>

const emit = (effect: Effect.Effect<void>, fields: LogFields): void => {
  Effect.runSync(effect.pipe(Effect.annotateLogs({ component: 'prettifier', ...fields })))
}

export const logDebug = (message: string, fields: LogFields = {}): void =>
  emit(Effect.logDebug(message), fields)

export const logWarning = (message: string, fields: LogFields = {}): void =>
  emit(Effect.logWarning(message), fields)
