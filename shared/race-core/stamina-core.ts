import { MAX_STAMINA } from './constants-core'
import { clamp } from './stat-system-core'
import type { RaceTuning } from './tuning-core'
import type { RacePhase, RaceType, TrackCondition } from './types-core'

export type EnduranceState = {
  stamina: number
  fatigue: number
}

export type EnduranceInput = {
  raceType: RaceType
  phase: RacePhase
  trackCondition: TrackCondition
  staminaStat: number
  gutsStat: number
  dtSec: number
}

// 기준 tick(referenceTickSec) 한 번에 쌓이는 양을 dt 비율로 늘리거나 줄인다.
export function applyFatigueAndStamina(
  state: EnduranceState,
  input: EnduranceInput,
  tuning: RaceTuning,
): EnduranceState {
  const t = tuning.stamina
  const scale = input.dtSec / tuning.referenceTickSec

  const fatigueResistance = Math.max(t.minFatigueFactor, 1 - (input.staminaStat / t.staminaDivisor) * t.staminaScale)
  const fatigueRate = tuning.raceTypes[input.raceType].fatigueRates[input.phase]
  const fatigue = state.fatigue + fatigueRate * fatigueResistance * scale

  const drainFactor = Math.max(t.minDrainFactor, 1 - (input.gutsStat / t.gutsDivisor) * t.gutsScale)
  const drain =
    (t.baseDrain * t.phaseDrainMultipliers[input.phase] + fatigue * t.fatigueFeedback) *
    drainFactor *
    t.trackDrainMultipliers[input.trackCondition] *
    scale
  const stamina = clamp(state.stamina - drain, t.raceFloor, MAX_STAMINA)

  return { stamina, fatigue }
}
