// shared race-core에서 쓰는 기본 타입 정의
export type StatName = 'Speed' | 'Stamina' | 'Power' | 'Guts' | 'Wit'

export interface Stats {
  Speed: number
  Stamina: number
  Power: number
  Guts: number
  Wit: number
}

export type RaceType = 'Sprint' | 'Mile' | 'Medium' | 'Long'
export type Surface = 'Turf' | 'Dirt'
export type TrackCondition = 'Firm' | 'Good' | 'Soft' | 'Heavy'
export type RunningStyle = 'FrontRunner' | 'PaceChaser' | 'LateSurger' | 'EndCloser'
export type AptitudeGrade = 'S' | 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G'
export type RacePhase = 'Start' | 'Mid' | 'Final' | 'Sprint'

export type IncidentKind =
  | 'slowStart'
  | 'stumble'
  | 'crowded'
  | 'blocked'
  | 'staminaDrain'
  | 'positionLoss'
  | 'finalStruggle'
  | 'exhaustion'

export type RaceConfig = {
  distance: number
  raceType: RaceType
  surface: Surface
  trackCondition: TrackCondition
}

// setup 단계 입력은 외부 설정 파일에서 오기 때문에 enum/숫자 값을 느슨하게 받는다.
export type RaceConfigInput = {
  distance: number
  raceType?: string
  surface?: string
  trackCondition?: string
}

export type CompetitorInput = {
  name?: string
  stats?: Partial<Record<StatName, number>>
  runningStyle?: string
  distanceAptitude?: Partial<Record<string, string>>
  surfaceAptitude?: Partial<Record<string, string>>
}

export type CompetitorProfile = {
  readonly id: number
  readonly name: string
  readonly stats: Readonly<Stats>
  readonly runningStyle: RunningStyle
  readonly distanceAptitude: Readonly<Record<RaceType, AptitudeGrade>>
  readonly surfaceAptitude: Readonly<Record<Surface, AptitudeGrade>>
}

export type SetupWarningCode =
  | 'negativeStat'
  | 'missingStat'
  | 'nonIntegerStat'
  | 'unknownRunningStyle'
  | 'unknownAptitudeGrade'
  | 'unknownRaceType'
  | 'unknownSurface'
  | 'unknownTrackCondition'
  | 'duplicateName'
  | 'missingName'

export type SetupWarning = {
  code: SetupWarningCode
  message: string
  competitorName?: string
  field?: string
  value?: unknown
}

export type ActiveIncident = {
  kind: IncidentKind
  durationTicks: number
  remainingTicks: number
  speedMultiplier: number
}

export type DnfRecord = {
  reason: string
  distance: number
  time: number
}

export type CompetitorStatus = 'active' | 'finished' | 'dnf'

export type RaceEvent =
  // 게이트 출발
  | {
      id: string
      type: 'start'
      time: number
      competitorId: number
      payload: { gate: number }
    }
  | {
      id: string
      type: 'incident'
      time: number
      competitorId: number
      payload: { incident: IncidentKind; durationTicks: number; speedMultiplier: number }
    }
  // 순위가 올라간 순간(추월) 이벤트, 제친 상대 id 목록을 같이 싣는다.
  | {
      id: string
      type: 'overtake'
      time: number
      competitorId: number
      payload: { fromRank: number; toRank: number; passedIds: number[] }
    }
  | {
      id: string
      type: 'duel'
      time: number
      competitorId: number
      payload: {
        participantIds: number[]
        staminaBoosts: Array<{ competitorId: number; amount: number }>
        momentumBoosts: Array<{ competitorId: number; amount: number }>
      }
    }
  | {
      id: string
      type: 'dnf'
      time: number
      competitorId: number
      payload: { reason: string; distance: number }
    }
  | {
      id: string
      type: 'finish'
      time: number
      competitorId: number
      payload: { finishTime: number; place: number }
    }

export type TickPosition = {
  competitorId: number
  name: string
  rank: number
  distanceCovered: number
  incidentKind: IncidentKind | null
  finished: boolean
  dnf: boolean
}

export type TickResult = {
  tick: number
  time: number
  positions: TickPosition[]
  events: RaceEvent[]
  complete: boolean
}

export type CompetitorSnapshot = {
  competitorId: number
  name: string
  status: CompetitorStatus
  distanceCovered: number
  stamina: number
  fatigue: number
  momentum: number
  lastSpeed: number
  incident: ActiveIncident | null
  dnf: DnfRecord | null
  finishTime: number | null
}

export type FinisherResult = {
  competitorId: number
  name: string
  place: number
  finishTime: number
}

export type NonFinisherResult = {
  competitorId: number
  name: string
  distanceAtDnf: number
  timeAtDnf: number
  reason: string
}

export type RaceOutcome = {
  finishers: FinisherResult[]
  nonFinishers: NonFinisherResult[]
}

// 해설/UI 쪽에 넘기는 읽기 전용 컨텍스트
export type CommentaryContext = {
  time: number
  rankedActivePositions: Array<{ competitorId: number; name: string; distanceCovered: number }>
  raceDistance: number
  remainingDistance: number
  activeIncidents: Array<{ competitorId: number; kind: IncidentKind }>
  finishedIds: number[]
}

export type Rng = () => number
