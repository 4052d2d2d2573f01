import { RACE_PHASES } from './constants-core'
import { clamp } from './stat-system-core'
import type { RaceTuning } from './tuning-core'
import type { RacePhase, RaceType } from './types-core'

// 진행률 -> 레이스 구간. 경계값은 그 지점에서 시작하는 구간에 속한다.
export function phaseForProgress(progress: number, raceType: RaceType, tuning: RaceTuning): RacePhase {
  const { mid, final, sprint } = tuning.raceTypes[raceType].phaseBoundaries
  const p = Number.isNaN(progress) ? 0 : clamp(progress, 0, 1)
  if (p >= sprint) return 'Sprint'
  if (p >= final) return 'Final'
  if (p >= mid) return 'Mid'
  return 'Start'
}

export function phaseIndex(phase: RacePhase): number {
  return RACE_PHASES.indexOf(phase)
}
