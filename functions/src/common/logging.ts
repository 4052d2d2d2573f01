import { logger } from 'firebase-functions'
import type { SetupWarning } from '../../../shared/race-core'

export type LogContext = Record<string, unknown>

// event 이름 + context 형태로 로그를 남기는 얇은 wrapper
export function logWarn(event: string, context: LogContext): void {
  logger.warn(event, context)
}

// 엔진은 로거를 모르기 때문에 setup warning은 onWarning 콜백으로 받아서 여기서 남긴다.
export function logSetupWarning(warning: SetupWarning): void {
  logWarn('Race setup warning', {
    code: warning.code,
    message: warning.message,
    competitorName: warning.competitorName,
    field: warning.field,
    value: warning.value,
  })
}
