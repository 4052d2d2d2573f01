import { DEFAULT_MOMENTUM, DEFAULT_STAMINA, MAX_STAMINA } from './constants-core'
import { rollDnf } from './dnf-core'
import { beginIncident, rollIncident, tickIncident } from './incident-core'
import { phaseForProgress } from './phase-core'
import { calcSpeed } from './speed-core'
import { applyFatigueAndStamina } from './stamina-core'
import { clamp } from './stat-system-core'
import type { RaceTuning } from './tuning-core'
import type {
  ActiveIncident,
  CompetitorProfile,
  CompetitorSnapshot,
  CompetitorStatus,
  DnfRecord,
  IncidentKind,
  RaceConfig,
  RacePhase,
  Rng,
} from './types-core'

export type CompetitorStepResult = {
  retired: DnfRecord | null
  incidentStarted: ActiveIncident | null
  finished: boolean
}

// 참가자 1명의 레이스 중 상태. 엔진이 tick마다 step을 부른다.
// rng 소비 순서(참가자마다): DNF -> 사고 -> 속도 jitter
export class CompetitorCore {
  readonly profile: CompetitorProfile
  readonly performance: number
  private readonly race: RaceConfig
  private readonly tuning: RaceTuning

  status: CompetitorStatus = 'active'
  distance: number = 0
  stamina: number = DEFAULT_STAMINA
  fatigue: number = 0
  momentum: number = DEFAULT_MOMENTUM
  lastSpeed: number = 0
  phase: RacePhase = 'Start'
  incident: ActiveIncident | null = null
  // 이번 tick에 속도 배율이 실제로 걸린 사고
  appliedIncidentKind: IncidentKind | null = null
  dnf: DnfRecord | null = null
  finishTime: number | null = null
  place: number | null = null
  duelInitiated: boolean = false
  duelBoosted: boolean = false

  constructor(profile: CompetitorProfile, performance: number, race: RaceConfig, tuning: RaceTuning) {
    this.profile = profile
    this.performance = performance
    this.race = race
    this.tuning = tuning
  }

  get id(): number {
    return this.profile.id
  }

  get name(): string {
    return this.profile.name
  }

  get isActive(): boolean {
    return this.status === 'active'
  }

  progress(): number {
    return this.distance / this.race.distance
  }

  addMomentum(delta: number) {
    const { min, max } = this.tuning.momentum
    this.momentum = clamp(this.momentum + delta, min, max)
  }

  // 추월/경합/사고로 밀린 momentum은 tick마다 조금씩 1.0으로 돌아간다.
  relaxMomentum(scale: number) {
    const amount = this.tuning.momentum.decayPerTick * scale
    if (this.momentum > DEFAULT_MOMENTUM) {
      this.momentum = Math.max(DEFAULT_MOMENTUM, this.momentum - amount)
    } else if (this.momentum < DEFAULT_MOMENTUM) {
      this.momentum = Math.min(DEFAULT_MOMENTUM, this.momentum + amount)
    }
  }

  addStamina(amount: number) {
    this.stamina = clamp(this.stamina + amount, this.tuning.stamina.raceFloor, MAX_STAMINA)
  }

  step(dtSec: number, tick: number, tickStartSec: number, rng: Rng): CompetitorStepResult {
    const result: CompetitorStepResult = { retired: null, incidentStarted: null, finished: false }
    this.appliedIncidentKind = null
    if (!this.isActive) return result

    const progress = this.progress()
    const retire = rollDnf({ profile: this.profile, race: this.race, progress }, rng, this.tuning)
    if (retire) {
      // 거리/시간은 이 tick 시작 시점으로 고정한다.
      this.status = 'dnf'
      this.incident = null
      this.lastSpeed = 0
      this.dnf = { reason: retire.reason, distance: this.distance, time: tickStartSec }
      result.retired = this.dnf
      return result
    }

    const { stats, runningStyle } = this.profile
    if (!this.incident) {
      const spec = rollIncident(
        { tick, progress, wit: stats.Wit, runningStyle, hasActiveIncident: false },
        rng,
        this.tuning,
      )
      if (spec) {
        this.incident = beginIncident(spec)
        this.addMomentum(-this.tuning.incidents.momentumPenalty)
        result.incidentStarted = { ...this.incident }
      }
    }

    let incidentMultiplier = 1
    let incidentExpired = false
    if (this.incident) {
      const tickResult = tickIncident(this.incident)
      incidentMultiplier = tickResult.speedMultiplier
      incidentExpired = tickResult.expired
      this.appliedIncidentKind = this.incident.kind
      this.incident = tickResult.next
    }

    this.phase = phaseForProgress(progress, this.race.raceType, this.tuning)
    const { speed } = calcSpeed(
      {
        raceType: this.race.raceType,
        phase: this.phase,
        runningStyle,
        performance: this.performance,
        stamina: this.stamina,
        fatigue: this.fatigue,
        guts: stats.Guts,
        jitter: rng(),
      },
      this.tuning,
    )
    this.lastSpeed = speed

    const endurance = applyFatigueAndStamina(
      { stamina: this.stamina, fatigue: this.fatigue },
      {
        raceType: this.race.raceType,
        phase: this.phase,
        trackCondition: this.race.trackCondition,
        staminaStat: stats.Stamina,
        gutsStat: stats.Guts,
        dtSec,
      },
      this.tuning,
    )
    this.stamina = endurance.stamina
    this.fatigue = endurance.fatigue

    const prevDistance = this.distance
    const delta = speed * dtSec * this.momentum * incidentMultiplier
    this.distance += delta

    this.relaxMomentum(dtSec / this.tuning.referenceTickSec)
    // 사고가 끝난 tick 뒤에 반동 보너스
    if (incidentExpired) this.addMomentum(this.tuning.incidents.momentumRebound)

    if (this.distance >= this.race.distance) {
      // 이번 tick 안에서 결승선을 넘은 경우 남은 거리 비율로 finishTime을 보간한다.
      this.status = 'finished'
      const remain = this.race.distance - prevDistance
      this.finishTime = delta > 0 ? tickStartSec + dtSec * (remain / delta) : tickStartSec + dtSec
      // 결승선을 넘어간 만큼은 버린다. 완주자끼리 순서는 착순으로 정한다.
      this.distance = this.race.distance
      this.incident = null
      result.finished = true
    }
    return result
  }

  toSnapshot(): CompetitorSnapshot {
    return {
      competitorId: this.id,
      name: this.name,
      status: this.status,
      distanceCovered: this.distance,
      stamina: this.stamina,
      fatigue: this.fatigue,
      momentum: this.momentum,
      lastSpeed: this.lastSpeed,
      incident: this.incident ? { ...this.incident } : null,
      dnf: this.dnf ? { ...this.dnf } : null,
      finishTime: this.finishTime,
    }
  }
}
