import { MAX_STAMINA } from './constants-core'
import { applyStaircase, clamp } from './stat-system-core'
import type { RaceTuning } from './tuning-core'
import type { RacePhase, RaceType, RunningStyle } from './types-core'

export type SpeedInput = {
  raceType: RaceType
  phase: RacePhase
  runningStyle: RunningStyle
  performance: number
  stamina: number
  fatigue: number
  guts: number
  // [0, 1) 난수 한 번. 호출하는 쪽에서 rng로 뽑아서 넘긴다.
  jitter: number
}

export type SpeedBreakdown = {
  target: number
  styleAdjustment: number
  fatigueMultiplier: number
  freshnessMultiplier: number
  effectiveStaminaMultiplier: number
  jitterMultiplier: number
}

export type SpeedResult = {
  speed: number
  breakdown: SpeedBreakdown
}

export function phaseTargetSpeed(raceType: RaceType, phase: RacePhase, tuning: RaceTuning): number {
  const { base, top, sprint } = tuning.raceTypes[raceType].speed
  switch (phase) {
    case 'Start':
      return base
    case 'Mid':
      return top
    case 'Final':
      return top * tuning.speed.finalPhasePremium
    case 'Sprint':
      return sprint
  }
}

// 남은 스태미나에 근성 효율을 곱한 값. 근성이 낮으면 같은 스태미나라도 덜 버틴다.
export function calcEffectiveStamina(staminaRatio: number, guts: number, tuning: RaceTuning): number {
  const { effectiveStaminaBase, gutsEfficiencyDivisor } = tuning.speed
  const gutsEfficiency = Math.min(Math.max(guts, 0) / gutsEfficiencyDivisor, 1)
  return staminaRatio * (effectiveStaminaBase + (1 - effectiveStaminaBase) * gutsEfficiency)
}

export function calcSpeed(input: SpeedInput, tuning: RaceTuning): SpeedResult {
  const raceTuning = tuning.raceTypes[input.raceType]
  const speedTuning = tuning.speed

  const target = phaseTargetSpeed(input.raceType, input.phase, tuning)
  const styleAdjustment = raceTuning.styleAdjustments[input.runningStyle][input.phase]
  let speed = target + target * styleAdjustment

  speed *= input.performance

  const fatigueMultiplier =
    1 - Math.min(input.fatigue * speedTuning.fatiguePenaltyPerUnit, speedTuning.fatiguePenaltyCap)
  speed *= fatigueMultiplier

  const staminaRatio = clamp(input.stamina / MAX_STAMINA, 0, 1)
  const freshnessMultiplier = applyStaircase(staminaRatio, speedTuning.freshness)
  const effectiveStaminaMultiplier = applyStaircase(
    calcEffectiveStamina(staminaRatio, input.guts, tuning),
    speedTuning.effectiveStamina,
  )
  speed *= freshnessMultiplier * effectiveStaminaMultiplier

  const jitterMultiplier = 1 + (2 * input.jitter - 1) * speedTuning.jitterAmplitude
  speed *= jitterMultiplier

  const floor = raceTuning.speed.base * speedTuning.floorFraction
  const ceiling = raceTuning.speed.sprint * speedTuning.ceilingFraction
  return {
    speed: clamp(speed, floor, ceiling),
    breakdown: {
      target,
      styleAdjustment,
      fatigueMultiplier,
      freshnessMultiplier,
      effectiveStaminaMultiplier,
      jitterMultiplier,
    },
  }
}
