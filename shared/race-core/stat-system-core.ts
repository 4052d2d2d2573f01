import { STAT_NAMES } from './constants-core'
import type { RaceTuning, Staircase } from './tuning-core'
import type { CompetitorProfile, RaceConfig, StatName, Stats } from './types-core'

// 스탯 -> 레이스 파라미터(퍼포먼스 계수) 변환 helper
export function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v
}

export function applyStaircase(value: number, staircase: Staircase): number {
  for (const step of staircase.steps) {
    if (value < step.below) return step.multiplier
  }
  return staircase.otherwise
}

export function applySoftCap(stat: number, softCap: number): number {
  // soft cap을 넘는 부분은 절반만 반영한다.
  return stat > softCap ? softCap + (stat - softCap) / 2 : stat
}

export function calcEffectiveStats(stats: Readonly<Stats>, race: RaceConfig, tuning: RaceTuning): Stats {
  const { statSoftCap, trackPenalties } = tuning.performance
  const penalty = trackPenalties[race.surface][race.trackCondition]
  const capped = (stat: StatName) => applySoftCap(stats[stat], statSoftCap)
  return {
    Speed: Math.max(0, capped('Speed') - penalty.Speed),
    Stamina: capped('Stamina'),
    Power: Math.max(0, capped('Power') - penalty.Power),
    Guts: capped('Guts'),
    Wit: capped('Wit'),
  }
}

export function calcBasePerformance(profile: CompetitorProfile, race: RaceConfig, tuning: RaceTuning): number {
  const raceTuning = tuning.raceTypes[race.raceType]
  const { stylePriorities, priorityMultipliers } = tuning.performance
  const priorities = stylePriorities[profile.runningStyle]
  const stats = calcEffectiveStats(profile.stats, race, tuning)

  // 레이스 타입별 가중치 x 각질 우선순위 배율
  let weighted = 0
  for (const stat of STAT_NAMES) {
    const priority = priorities.indexOf(stat)
    const multiplier = priority >= 0 ? (priorityMultipliers[priority] ?? 1) : 1
    weighted += stats[stat] * raceTuning.statWeights[stat] * multiplier
  }

  const distanceMultiplier = raceTuning.aptitudeMultipliers[profile.distanceAptitude[race.raceType]]
  const surfaceMultiplier = raceTuning.aptitudeMultipliers[profile.surfaceAptitude[race.surface]]
  return weighted * distanceMultiplier * surfaceMultiplier
}

export function normalizePerformance(values: readonly number[], band: { floor: number; width: number }): number[] {
  if (values.length === 0) return []
  const min = Math.min(...values)
  const max = Math.max(...values)
  const span = max - min
  // 전원이 같은 값이면 밴드 중앙값으로 맞춘다.
  if (span <= 0) return values.map(() => band.floor + band.width / 2)
  return values.map((value) => band.floor + ((value - min) / span) * band.width)
}

export function calcPerformanceCoefficients(
  profiles: readonly CompetitorProfile[],
  race: RaceConfig,
  tuning: RaceTuning,
): number[] {
  const base = profiles.map((profile) => calcBasePerformance(profile, race, tuning))
  return normalizePerformance(base, tuning.raceTypes[race.raceType].normalizationBand)
}
