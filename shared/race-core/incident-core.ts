import { pickRandomSeeded } from './rng-core'
import type { IncidentSpec, RaceTuning } from './tuning-core'
import type { ActiveIncident, Rng, RunningStyle } from './types-core'

export type IncidentRollInput = {
  tick: number
  progress: number
  wit: number
  runningStyle: RunningStyle
  hasActiveIncident: boolean
}

export type IncidentTickResult = {
  speedMultiplier: number
  // 이번 tick까지 적용하고 끝난 경우 null
  next: ActiveIncident | null
  expired: boolean
}

export function calcIncidentChance(wit: number, runningStyle: RunningStyle, tuning: RaceTuning): number {
  const t = tuning.incidents
  return Math.max(t.minChance, t.baseChance - wit / t.witDivisor) * t.styleFactors[runningStyle]
}

export function incidentKindsForProgress(progress: number, tuning: RaceTuning): readonly IncidentSpec[] {
  const bracket = tuning.incidents.brackets.find((candidate) => progress < candidate.untilProgress)
  return bracket?.kinds ?? []
}

// 진행 중인 사고가 없고 출발 직후 구간을 지났을 때만 굴린다.
// rng 소비 순서: gate -> chance -> 종류 선택
export function rollIncident(input: IncidentRollInput, rng: Rng, tuning: RaceTuning): IncidentSpec | null {
  if (input.hasActiveIncident) return null
  if (input.tick <= tuning.incidents.warmupTicks) return null

  if (rng() >= tuning.incidents.gateChance) return null
  if (rng() >= calcIncidentChance(input.wit, input.runningStyle, tuning)) return null

  return pickRandomSeeded(incidentKindsForProgress(input.progress, tuning), rng) ?? null
}

export function beginIncident(spec: IncidentSpec): ActiveIncident {
  return {
    kind: spec.kind,
    durationTicks: spec.durationTicks,
    remainingTicks: spec.durationTicks,
    speedMultiplier: spec.speedMultiplier,
  }
}

export function tickIncident(incident: ActiveIncident): IncidentTickResult {
  const remainingTicks = incident.remainingTicks - 1
  if (remainingTicks <= 0) {
    return { speedMultiplier: incident.speedMultiplier, next: null, expired: true }
  }
  return {
    speedMultiplier: incident.speedMultiplier,
    next: { ...incident, remainingTicks },
    expired: false,
  }
}
