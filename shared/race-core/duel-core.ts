import type { RaceTuning } from './tuning-core'
import type { Rng } from './types-core'

export type DuelCandidate = {
  competitorId: number
  distance: number
  guts: number
  // 전체 순위표 기준 0부터 시작하는 인덱스
  rankIndex: number
}

export type DuelRollInput = {
  leaderProgress: number
  // 달리고 있는 참가자만, 거리 내림차순
  candidates: readonly DuelCandidate[]
  fieldSize: number
  initiators: ReadonlySet<number>
}

export type DuelTrigger = {
  initiatorId: number
  participantIds: number[]
}

export function isInDuelWindow(leaderProgress: number, tuning: RaceTuning): boolean {
  return leaderProgress >= tuning.duel.windowMin && leaderProgress <= tuning.duel.windowMax
}

// 앞뒤 간격이 proximity 이하로 이어지는 무리를 묶는다. 2명 이상인 무리만 남긴다.
export function findDuelClusters<T extends { distance: number }>(
  sorted: readonly T[],
  proximityMeters: number,
): T[][] {
  const clusters: T[][] = []
  let current: T[] = []
  for (const entry of sorted) {
    const last = current[current.length - 1]
    if (last && last.distance - entry.distance <= proximityMeters) {
      current.push(entry)
      continue
    }
    if (current.length >= 2) clusters.push(current)
    current = [entry]
  }
  if (current.length >= 2) clusters.push(current)
  return clusters
}

export function calcDuelChance(guts: number, rankIndex: number, fieldSize: number, tuning: RaceTuning): number {
  const t = tuning.duel
  const relative = fieldSize > 0 ? rankIndex / fieldSize : 0
  const positionFactor = relative >= t.midPackMin && relative <= t.midPackMax ? t.midPackFactor : 1
  return Math.min(t.maxGutsChance, guts / t.gutsDivisor) * positionFactor * t.baseChance
}

export function duelStaminaTopUp(guts: number, tuning: RaceTuning): number {
  return Math.min(tuning.duel.staminaTopUpCap, Math.max(guts, 0) / tuning.duel.staminaTopUpDivisor)
}

export function duelMomentumBoost(guts: number, tuning: RaceTuning): number {
  const tier = tuning.duel.momentumTiers.find((candidate) => guts > candidate.gutsAbove)
  return tier?.boost ?? 0
}

// 한 tick에 경합은 최대 한 번. 처음 성공한 참가자가 그 무리의 경합을 연다.
export function rollDuel(input: DuelRollInput, rng: Rng, tuning: RaceTuning): DuelTrigger | null {
  if (!isInDuelWindow(input.leaderProgress, tuning)) return null

  for (const cluster of findDuelClusters(input.candidates, tuning.duel.proximityMeters)) {
    for (const member of cluster) {
      if (input.initiators.has(member.competitorId)) continue
      const chance = calcDuelChance(member.guts, member.rankIndex, input.fieldSize, tuning)
      if (rng() < chance) {
        return {
          initiatorId: member.competitorId,
          participantIds: cluster.map((entry) => entry.competitorId),
        }
      }
    }
  }
  return null
}
