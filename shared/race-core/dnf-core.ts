import { STAT_NAMES } from './constants-core'
import type { RaceTuning } from './tuning-core'
import type { CompetitorProfile, RaceConfig, Rng } from './types-core'

export type DnfRollInput = {
  profile: CompetitorProfile
  race: RaceConfig
  progress: number
}

export type DnfRoll = {
  reason: string
}

// 이번 레이스의 거리/주로 적성만 본다.
function countWorstGrades(profile: CompetitorProfile, race: RaceConfig, tuning: RaceTuning): number {
  const { worstGrade } = tuning.dnf
  let count = 0
  if (profile.distanceAptitude[race.raceType] === worstGrade) count++
  if (profile.surfaceAptitude[race.surface] === worstGrade) count++
  return count
}

export function calcDnfChance(profile: CompetitorProfile, race: RaceConfig, tuning: RaceTuning): number {
  const t = tuning.dnf
  let chance = t.baseChance
  for (const stat of STAT_NAMES) {
    const value = profile.stats[stat]
    if (value < t.deficitThreshold) chance += (t.deficitThreshold - value) * t.perPointPenalty
  }

  let multiplier = 1 + countWorstGrades(profile, race, tuning) * t.worstGradeBonus
  if (profile.stats.Stamina < t.lowStatThreshold || profile.stats.Guts < t.lowStatThreshold) {
    multiplier += t.lowStatBonus
  }
  return Math.min(chance * multiplier, t.maxChance)
}

// 이 레이스에서 리타이어할 만한 이유. 하나도 없으면 리타이어하지 않는다.
export function dnfReasons(profile: CompetitorProfile, race: RaceConfig, tuning: RaceTuning): string[] {
  const t = tuning.dnf
  const reasons: string[] = []
  if (profile.stats.Stamina < t.lowStatThreshold) reasons.push('exhaustion')
  if (profile.stats.Guts < t.lowStatThreshold) reasons.push('loss of will')
  if (profile.distanceAptitude[race.raceType] === t.worstGrade) reasons.push('unsuitable distance')
  if (profile.surfaceAptitude[race.surface] === t.worstGrade) reasons.push('unsuitable surface')
  return reasons
}

export function isInDnfWindow(progress: number, tuning: RaceTuning): boolean {
  return progress >= tuning.dnf.windowMin && progress < tuning.dnf.windowMax
}

// rng 소비 순서: gate -> chance. 창 밖이면 rng를 쓰지 않는다.
export function rollDnf(input: DnfRollInput, rng: Rng, tuning: RaceTuning): DnfRoll | null {
  if (!isInDnfWindow(input.progress, tuning)) return null
  if (rng() >= tuning.dnf.gateChance) return null
  if (rng() >= calcDnfChance(input.profile, input.race, tuning)) return null

  const reasons = dnfReasons(input.profile, input.race, tuning)
  if (reasons.length === 0) return null
  return { reason: reasons.join(', ') }
}
