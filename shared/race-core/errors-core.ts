export type RaceSetupErrorCode =
  | 'invalidDistance'
  | 'emptyField'
  | 'invalidCompetitor'
  | 'invalidTuning'
  | 'unknownRace'

// 레이스 시작 전에 걸러내는 설정 오류. tick이 한 번도 돌기 전에만 던진다.
export class RaceSetupError extends Error {
  readonly code: RaceSetupErrorCode

  constructor(code: RaceSetupErrorCode, message: string) {
    super(message)
    this.name = 'RaceSetupError'
    this.code = code
  }
}
