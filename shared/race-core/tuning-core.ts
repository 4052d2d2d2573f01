import { DEFAULT_RACE_TUNING, RACE_TYPES } from './constants-core'
import { RaceSetupError } from './errors-core'
import type {
  AptitudeGrade,
  IncidentKind,
  RacePhase,
  RaceType,
  RunningStyle,
  StatName,
  Stats,
  Surface,
  TrackCondition,
} from './types-core'

export type PhaseTable = Record<RacePhase, number>

// value가 below 미만인 첫 계단의 배율을 쓰고, 어디에도 안 걸리면 otherwise
export type Staircase = {
  steps: Array<{ below: number; multiplier: number }>
  otherwise: number
}

export type RaceTypeTuning = {
  speed: { base: number; top: number; sprint: number }
  statWeights: Stats
  aptitudeMultipliers: Record<AptitudeGrade, number>
  normalizationBand: { floor: number; width: number }
  // 각 구간이 시작하는 진행률 (Start는 항상 0)
  phaseBoundaries: { mid: number; final: number; sprint: number }
  // 0이면 중립, 양수는 보너스, 음수는 페널티
  styleAdjustments: Record<RunningStyle, PhaseTable>
  fatigueRates: PhaseTable
}

export type PerformanceTuning = {
  stylePriorities: Record<RunningStyle, StatName[]>
  priorityMultipliers: number[]
  statSoftCap: number
  trackPenalties: Record<Surface, Record<TrackCondition, { Speed: number; Power: number }>>
}

export type SpeedTuning = {
  finalPhasePremium: number
  fatiguePenaltyPerUnit: number
  fatiguePenaltyCap: number
  freshness: Staircase
  effectiveStamina: Staircase
  effectiveStaminaBase: number
  gutsEfficiencyDivisor: number
  jitterAmplitude: number
  floorFraction: number
  ceilingFraction: number
}

export type StaminaTuning = {
  raceFloor: number
  baseDrain: number
  phaseDrainMultipliers: PhaseTable
  fatigueFeedback: number
  gutsDivisor: number
  gutsScale: number
  minDrainFactor: number
  staminaDivisor: number
  staminaScale: number
  minFatigueFactor: number
  trackDrainMultipliers: Record<TrackCondition, number>
}

export type IncidentSpec = {
  kind: IncidentKind
  durationTicks: number
  speedMultiplier: number
}

export type IncidentTuning = {
  warmupTicks: number
  baseChance: number
  witDivisor: number
  minChance: number
  gateChance: number
  styleFactors: Record<RunningStyle, number>
  brackets: Array<{ untilProgress: number; kinds: IncidentSpec[] }>
  momentumPenalty: number
  momentumRebound: number
}

export type DnfTuning = {
  windowMin: number
  windowMax: number
  gateChance: number
  baseChance: number
  deficitThreshold: number
  perPointPenalty: number
  worstGrade: AptitudeGrade
  worstGradeBonus: number
  lowStatThreshold: number
  lowStatBonus: number
  maxChance: number
}

export type DuelTuning = {
  windowMin: number
  windowMax: number
  proximityMeters: number
  gutsDivisor: number
  maxGutsChance: number
  midPackMin: number
  midPackMax: number
  midPackFactor: number
  baseChance: number
  staminaTopUpDivisor: number
  staminaTopUpCap: number
  momentumTiers: Array<{ gutsAbove: number; boost: number }>
}

export type MomentumTuning = {
  min: number
  max: number
  overtakeGain: number
  decayPerTick: number
}

export type RaceTuning = {
  referenceTickSec: number
  raceTypes: Record<RaceType, RaceTypeTuning>
  performance: PerformanceTuning
  speed: SpeedTuning
  stamina: StaminaTuning
  incidents: IncidentTuning
  dnf: DnfTuning
  duel: DuelTuning
  momentum: MomentumTuning
}

// 섹션 단위로 덮어쓴다. 섹션 안의 테이블(배열/맵)은 통째로 교체된다.
export type TuningOverrides = {
  referenceTickSec?: number
  raceTypes?: Partial<Record<RaceType, Partial<RaceTypeTuning>>>
  performance?: Partial<PerformanceTuning>
  speed?: Partial<SpeedTuning>
  stamina?: Partial<StaminaTuning>
  incidents?: Partial<IncidentTuning>
  dnf?: Partial<DnfTuning>
  duel?: Partial<DuelTuning>
  momentum?: Partial<MomentumTuning>
}

function mergeRaceTypes(overrides: TuningOverrides['raceTypes']): Record<RaceType, RaceTypeTuning> {
  const base = DEFAULT_RACE_TUNING.raceTypes
  return {
    Sprint: { ...base.Sprint, ...overrides?.Sprint },
    Mile: { ...base.Mile, ...overrides?.Mile },
    Medium: { ...base.Medium, ...overrides?.Medium },
    Long: { ...base.Long, ...overrides?.Long },
  }
}

export function resolveTuning(overrides: TuningOverrides = {}): RaceTuning {
  const base = DEFAULT_RACE_TUNING
  const tuning: RaceTuning = {
    referenceTickSec: overrides.referenceTickSec ?? base.referenceTickSec,
    raceTypes: mergeRaceTypes(overrides.raceTypes),
    performance: { ...base.performance, ...overrides.performance },
    speed: { ...base.speed, ...overrides.speed },
    stamina: { ...base.stamina, ...overrides.stamina },
    incidents: { ...base.incidents, ...overrides.incidents },
    dnf: { ...base.dnf, ...overrides.dnf },
    duel: { ...base.duel, ...overrides.duel },
    momentum: { ...base.momentum, ...overrides.momentum },
  }
  assertTuning(tuning)
  return tuning
}

export function assertTuning(tuning: RaceTuning): void {
  if (!(tuning.referenceTickSec > 0)) {
    throw new RaceSetupError('invalidTuning', 'referenceTickSec must be positive')
  }

  for (const raceType of RACE_TYPES) {
    const { phaseBoundaries, normalizationBand } = tuning.raceTypes[raceType]
    const { mid, final, sprint } = phaseBoundaries
    // 구간 경계는 (0, 1] 안에서 겹치지 않게 순서대로 있어야 한다.
    if (!(mid > 0 && mid <= final && final <= sprint && sprint <= 1)) {
      throw new RaceSetupError('invalidTuning', `Phase boundaries for ${raceType} must be ordered in (0, 1]`)
    }
    if (!(normalizationBand.floor > 0) || !(normalizationBand.width >= 0)) {
      throw new RaceSetupError('invalidTuning', `Normalization band for ${raceType} must be positive`)
    }
  }

  if (!(tuning.speed.floorFraction > 0)) {
    throw new RaceSetupError('invalidTuning', 'speed.floorFraction must be positive')
  }
  if (!(tuning.momentum.min > 0) || tuning.momentum.min > tuning.momentum.max) {
    throw new RaceSetupError('invalidTuning', 'momentum band must satisfy 0 < min <= max')
  }
  if (!(tuning.momentum.decayPerTick >= 0)) {
    throw new RaceSetupError('invalidTuning', 'momentum.decayPerTick must not be negative')
  }
  if (tuning.incidents.brackets.some((bracket) => bracket.kinds.length === 0)) {
    throw new RaceSetupError('invalidTuning', 'Every incident bracket needs at least one kind')
  }
}
