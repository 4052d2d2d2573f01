import { CompetitorCore } from './competitor-core'
import { DEFAULT_RACE_SEED } from './constants-core'
import { duelMomentumBoost, duelStaminaTopUp, rollDuel } from './duel-core'
import { buildNameIndex, normalizeCompetitors, normalizeRaceConfig } from './profile-core'
import { detectOvertakes, rankByDistance, ranksFromOrder } from './ranking-core'
import { createSeededRandom } from './rng-core'
import { calcPerformanceCoefficients } from './stat-system-core'
import { resolveTuning } from './tuning-core'
import type { RaceTuning, TuningOverrides } from './tuning-core'
import type {
  CommentaryContext,
  CompetitorInput,
  CompetitorProfile,
  CompetitorSnapshot,
  RaceConfig,
  RaceConfigInput,
  RaceEvent,
  RaceOutcome,
  Rng,
  SetupWarning,
  TickPosition,
  TickResult,
} from './types-core'

export type RaceEngineOptions = {
  // rng를 직접 넣으면 seed는 무시된다.
  rng?: Rng
  seed?: string | number
  tuning?: TuningOverrides
  onWarning?: (warning: SetupWarning) => void
}

function toMs(timeSec: number): number {
  return Math.round(timeSec * 1000)
}

/**
 * 여러 참가자의 레이스를 tick 단위로 진행하는 엔진.
 *
 * 생성자에서 입력을 정리/검증하고(치명적인 문제는 RaceSetupError),
 * 이후에는 `step(dt)`를 부를 때마다 모든 참가자를 한 tick씩 움직인 뒤
 * 순위, 추월, 경합을 계산해서 그 tick의 이벤트와 함께 돌려준다.
 * 모든 참가자가 완주 또는 리타이어하면 complete가 되고, 이후 step은 아무것도 하지 않는다.
 */
export class RaceEngine {
  readonly config: RaceConfig
  readonly profiles: readonly CompetitorProfile[]
  readonly warnings: readonly SetupWarning[]

  private readonly tuning: RaceTuning
  private readonly rng: Rng
  private readonly competitors: CompetitorCore[]
  private readonly nameIndex: Map<string, number>
  private rankingOrder: number[]
  private tickCount: number = 0
  private timeSec: number = 0
  private started: boolean = false
  private finishedCount: number = 0

  constructor(race: RaceConfigInput, competitors: readonly CompetitorInput[], options: RaceEngineOptions = {}) {
    const warnings: SetupWarning[] = []
    this.tuning = resolveTuning(options.tuning)
    this.config = normalizeRaceConfig(race, warnings)
    this.profiles = normalizeCompetitors(competitors, warnings)
    this.nameIndex = buildNameIndex(this.profiles, warnings)
    this.warnings = warnings
    warnings.forEach((warning) => options.onWarning?.(warning))

    this.rng = options.rng ?? createSeededRandom(options.seed ?? DEFAULT_RACE_SEED)

    const coefficients = calcPerformanceCoefficients(this.profiles, this.config, this.tuning)
    this.competitors = this.profiles.map(
      (profile) => new CompetitorCore(profile, coefficients[profile.id] ?? 1, this.config, this.tuning),
    )
    this.rankingOrder = this.computeRankingOrder()
  }

  get tick(): number {
    return this.tickCount
  }

  get time(): number {
    return this.timeSec
  }

  get isComplete(): boolean {
    return this.competitors.every((competitor) => !competitor.isActive)
  }

  idByName(name: string): number | undefined {
    return this.nameIndex.get(name)
  }

  performanceCoefficients(): number[] {
    return this.competitors.map((competitor) => competitor.performance)
  }

  step(dtSec: number): TickResult {
    if (!Number.isFinite(dtSec) || dtSec <= 0) {
      throw new RangeError(`step dt must be a positive finite number (got ${dtSec})`)
    }
    if (this.isComplete) {
      return { tick: this.tickCount, time: this.timeSec, positions: this.positions(), events: [], complete: true }
    }

    const events: RaceEvent[] = []
    if (!this.started) {
      this.started = true
      this.competitors.forEach((competitor) => {
        events.push({
          id: `start-${competitor.id}-0`,
          type: 'start',
          time: 0,
          competitorId: competitor.id,
          payload: { gate: competitor.id + 1 },
        })
      })
    }

    this.tickCount += 1
    const tickStartSec = this.timeSec
    const settledIds = new Set(this.competitors.filter((c) => c.status === 'finished').map((c) => c.id))
    const finishedThisTick: CompetitorCore[] = []

    this.competitors.forEach((competitor) => {
      const result = competitor.step(dtSec, this.tickCount, tickStartSec, this.rng)
      if (result.retired) {
        events.push({
          id: `dnf-${competitor.id}-${toMs(result.retired.time)}`,
          type: 'dnf',
          time: result.retired.time,
          competitorId: competitor.id,
          payload: { reason: result.retired.reason, distance: result.retired.distance },
        })
      }
      if (result.incidentStarted) {
        events.push({
          id: `incident-${competitor.id}-${toMs(tickStartSec)}`,
          type: 'incident',
          time: tickStartSec,
          competitorId: competitor.id,
          payload: {
            incident: result.incidentStarted.kind,
            durationTicks: result.incidentStarted.durationTicks,
            speedMultiplier: result.incidentStarted.speedMultiplier,
          },
        })
      }
      if (result.finished) finishedThisTick.push(competitor)
    })
    this.timeSec = tickStartSec + dtSec

    // 같은 tick에 들어온 경우 보간된 finishTime 순서로 착순을 정한다.
    finishedThisTick
      .sort((a, b) => (a.finishTime ?? 0) - (b.finishTime ?? 0) || a.id - b.id)
      .forEach((competitor) => {
        this.finishedCount += 1
        competitor.place = this.finishedCount
        const finishTime = competitor.finishTime ?? this.timeSec
        events.push({
          id: `finish-${competitor.id}-${toMs(finishTime)}`,
          type: 'finish',
          time: finishTime,
          competitorId: competitor.id,
          payload: { finishTime, place: this.finishedCount },
        })
      })

    events.push(...this.updateRanking(settledIds))

    const duel = this.resolveDuel()
    if (duel) events.push(duel)

    return {
      tick: this.tickCount,
      time: this.timeSec,
      positions: this.positions(),
      events,
      complete: this.isComplete,
    }
  }

  ranking(): TickPosition[] {
    return this.positions()
  }

  snapshot(): CompetitorSnapshot[] {
    return this.competitors.map((competitor) => competitor.toSnapshot())
  }

  outcome(): RaceOutcome {
    const finishers = this.competitors
      .filter((competitor) => competitor.status === 'finished')
      .sort((a, b) => (a.place ?? 0) - (b.place ?? 0))
      .map((competitor) => ({
        competitorId: competitor.id,
        name: competitor.name,
        place: competitor.place ?? 0,
        finishTime: competitor.finishTime ?? 0,
      }))
    const nonFinishers = this.competitors.flatMap((competitor) =>
      competitor.dnf
        ? [
            {
              competitorId: competitor.id,
              name: competitor.name,
              distanceAtDnf: competitor.dnf.distance,
              timeAtDnf: competitor.dnf.time,
              reason: competitor.dnf.reason,
            },
          ]
        : [],
    )
    return { finishers, nonFinishers }
  }

  commentaryContext(): CommentaryContext {
    const active = this.orderedCompetitors().filter((competitor) => competitor.isActive)
    const leaderDistance = active[0]?.distance ?? this.config.distance
    return {
      time: this.timeSec,
      rankedActivePositions: active.map((competitor) => ({
        competitorId: competitor.id,
        name: competitor.name,
        distanceCovered: competitor.distance,
      })),
      raceDistance: this.config.distance,
      remainingDistance: Math.max(0, this.config.distance - leaderDistance),
      activeIncidents: active.flatMap((competitor) =>
        competitor.incident ? [{ competitorId: competitor.id, kind: competitor.incident.kind }] : [],
      ),
      finishedIds: this.competitors
        .filter((competitor) => competitor.status === 'finished')
        .sort((a, b) => (a.place ?? 0) - (b.place ?? 0))
        .map((competitor) => competitor.id),
    }
  }

  private computeRankingOrder(): number[] {
    return rankByDistance(
      this.competitors.map((competitor) => ({
        competitorId: competitor.id,
        distance: competitor.distance,
        place: competitor.place,
      })),
    )
  }

  private orderedCompetitors(): CompetitorCore[] {
    return this.rankingOrder.flatMap((id) => {
      const competitor = this.competitors[id]
      return competitor ? [competitor] : []
    })
  }

  private positions(): TickPosition[] {
    return this.orderedCompetitors().map((competitor, index) => ({
      competitorId: competitor.id,
      name: competitor.name,
      rank: index + 1,
      distanceCovered: competitor.distance,
      incidentKind: competitor.appliedIncidentKind,
      finished: competitor.status === 'finished',
      dnf: competitor.status === 'dnf',
    }))
  }

  private updateRanking(settledIds: ReadonlySet<number>): RaceEvent[] {
    const previousRanks = ranksFromOrder(this.rankingOrder)
    this.rankingOrder = this.computeRankingOrder()
    const nextRanks = ranksFromOrder(this.rankingOrder)

    return detectOvertakes(previousRanks, nextRanks, settledIds).map((improvement): RaceEvent => {
      this.competitors[improvement.competitorId]?.addMomentum(this.tuning.momentum.overtakeGain)
      return {
        id: `overtake-${improvement.competitorId}-${toMs(this.timeSec)}-${improvement.fromRank}-${improvement.toRank}`,
        type: 'overtake',
        time: this.timeSec,
        competitorId: improvement.competitorId,
        payload: {
          fromRank: improvement.fromRank,
          toRank: improvement.toRank,
          passedIds: improvement.passedIds,
        },
      }
    })
  }

  private resolveDuel(): RaceEvent | null {
    const ordered = this.orderedCompetitors()
    const leader = ordered[0]
    if (!leader) return null

    const candidates = ordered.flatMap((competitor, rankIndex) =>
      competitor.isActive
        ? [
            {
              competitorId: competitor.id,
              distance: competitor.distance,
              guts: competitor.profile.stats.Guts,
              rankIndex,
            },
          ]
        : [],
    )
    const initiators = new Set(this.competitors.filter((c) => c.duelInitiated).map((c) => c.id))
    const trigger = rollDuel(
      { leaderProgress: leader.progress(), candidates, fieldSize: this.competitors.length, initiators },
      this.rng,
      this.tuning,
    )
    if (!trigger) return null

    const initiator = this.competitors[trigger.initiatorId]
    if (initiator) initiator.duelInitiated = true

    const staminaBoosts: Array<{ competitorId: number; amount: number }> = []
    const momentumBoosts: Array<{ competitorId: number; amount: number }> = []
    trigger.participantIds.forEach((id) => {
      const competitor = this.competitors[id]
      // 부스트는 레이스당 한 번만 받는다.
      if (!competitor || competitor.duelBoosted) return
      competitor.duelBoosted = true
      const guts = competitor.profile.stats.Guts
      const staminaAmount = duelStaminaTopUp(guts, this.tuning)
      const momentumAmount = duelMomentumBoost(guts, this.tuning)
      competitor.addStamina(staminaAmount)
      competitor.addMomentum(momentumAmount)
      staminaBoosts.push({ competitorId: id, amount: staminaAmount })
      momentumBoosts.push({ competitorId: id, amount: momentumAmount })
    })

    return {
      id: `duel-${trigger.initiatorId}-${toMs(this.timeSec)}`,
      type: 'duel',
      time: this.timeSec,
      competitorId: trigger.initiatorId,
      payload: { participantIds: trigger.participantIds, staminaBoosts, momentumBoosts },
    }
  }
}
