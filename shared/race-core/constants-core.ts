import type { RaceTuning } from './tuning-core'
import type {
  AptitudeGrade,
  RacePhase,
  RaceType,
  RunningStyle,
  StatName,
  Surface,
  TrackCondition,
} from './types-core'

// shared race-core에서 쓰는 기본 상수들
// (시뮬레이션 간격, 출력 프레임, 안전 상한 등)
export const DEFAULT_TICK_SEC = 0.05
export const DEFAULT_OUTPUT_FRAME_MS = 100
// 엔진 자체에는 시간 상한이 없고, 배치 러너만 이 값으로 끊는다.
export const DEFAULT_MAX_SIM_TIME_SEC = 3600
// rng도 seed도 안 넘겼을 때 쓰는 seed
export const DEFAULT_RACE_SEED = 'race'

export const STAT_NAMES: readonly StatName[] = ['Speed', 'Stamina', 'Power', 'Guts', 'Wit']
export const RACE_TYPES: readonly RaceType[] = ['Sprint', 'Mile', 'Medium', 'Long']
export const SURFACES: readonly Surface[] = ['Turf', 'Dirt']
export const TRACK_CONDITIONS: readonly TrackCondition[] = ['Firm', 'Good', 'Soft', 'Heavy']
export const RUNNING_STYLES: readonly RunningStyle[] = ['FrontRunner', 'PaceChaser', 'LateSurger', 'EndCloser']
export const APTITUDE_GRADES: readonly AptitudeGrade[] = ['S', 'A', 'B', 'C', 'D', 'E', 'F', 'G']
export const RACE_PHASES: readonly RacePhase[] = ['Start', 'Mid', 'Final', 'Sprint']

export const DEFAULT_STAMINA = 100
export const MAX_STAMINA = 100
export const DEFAULT_MOMENTUM = 1.0

const SPRINT_APTITUDE = { S: 1.12, A: 1.06, B: 1.0, C: 0.94, D: 0.88, E: 0.82, F: 0.76, G: 0.7 }
const MILE_APTITUDE = { S: 1.1, A: 1.05, B: 1.0, C: 0.95, D: 0.9, E: 0.85, F: 0.8, G: 0.75 }
const MEDIUM_APTITUDE = { S: 1.08, A: 1.04, B: 1.0, C: 0.96, D: 0.92, E: 0.88, F: 0.84, G: 0.8 }
const LONG_APTITUDE = { S: 1.15, A: 1.08, B: 1.0, C: 0.92, D: 0.85, E: 0.78, F: 0.72, G: 0.65 }

// 밸런스 테이블 전체. 값은 튜닝 대상이라 resolveTuning으로 일부만 덮어쓸 수 있다.
export const DEFAULT_RACE_TUNING: RaceTuning = {
  referenceTickSec: DEFAULT_TICK_SEC,
  raceTypes: {
    Sprint: {
      speed: { base: 16.5, top: 17.5, sprint: 18.0 },
      statWeights: { Speed: 0.45, Stamina: 0.15, Power: 0.2, Guts: 0.12, Wit: 0.08 },
      aptitudeMultipliers: SPRINT_APTITUDE,
      normalizationBand: { floor: 0.82, width: 0.3 },
      phaseBoundaries: { mid: 0.2, final: 0.7, sprint: 0.9 },
      styleAdjustments: {
        FrontRunner: { Start: 0.2, Mid: 0.1, Final: 0.05, Sprint: 0.05 },
        PaceChaser: { Start: 0.08, Mid: 0.12, Final: 0.08, Sprint: 0.08 },
        LateSurger: { Start: -0.05, Mid: 0.08, Final: 0.1, Sprint: 0.1 },
        EndCloser: { Start: -0.1, Mid: -0.05, Final: 0.15, Sprint: 0.15 },
      },
      fatigueRates: { Start: 0.0015, Mid: 0.002, Final: 0.003, Sprint: 0.004 },
    },
    Mile: {
      speed: { base: 16.2, top: 17.2, sprint: 17.7 },
      statWeights: { Speed: 0.35, Stamina: 0.25, Power: 0.18, Guts: 0.14, Wit: 0.08 },
      aptitudeMultipliers: MILE_APTITUDE,
      normalizationBand: { floor: 0.8, width: 0.33 },
      phaseBoundaries: { mid: 0.15, final: 0.6, sprint: 0.85 },
      styleAdjustments: {
        FrontRunner: { Start: 0.15, Mid: 0.08, Final: -0.05, Sprint: -0.05 },
        PaceChaser: { Start: 0.06, Mid: 0.1, Final: 0.06, Sprint: 0.06 },
        LateSurger: { Start: -0.06, Mid: 0.06, Final: 0.12, Sprint: 0.12 },
        EndCloser: { Start: -0.12, Mid: -0.06, Final: 0.18, Sprint: 0.18 },
      },
      fatigueRates: { Start: 0.002, Mid: 0.0025, Final: 0.004, Sprint: 0.005 },
    },
    Medium: {
      speed: { base: 16.0, top: 17.0, sprint: 17.5 },
      statWeights: { Speed: 0.3, Stamina: 0.35, Power: 0.15, Guts: 0.12, Wit: 0.08 },
      aptitudeMultipliers: MEDIUM_APTITUDE,
      normalizationBand: { floor: 0.78, width: 0.36 },
      phaseBoundaries: { mid: 0.1, final: 0.5, sprint: 0.8 },
      styleAdjustments: {
        FrontRunner: { Start: 0.12, Mid: 0.06, Final: -0.08, Sprint: -0.08 },
        PaceChaser: { Start: 0.04, Mid: 0.08, Final: 0.05, Sprint: 0.05 },
        LateSurger: { Start: -0.07, Mid: 0.05, Final: 0.14, Sprint: 0.14 },
        EndCloser: { Start: -0.14, Mid: -0.07, Final: 0.2, Sprint: 0.2 },
      },
      fatigueRates: { Start: 0.0025, Mid: 0.003, Final: 0.004, Sprint: 0.006 },
    },
    Long: {
      speed: { base: 15.8, top: 16.8, sprint: 17.3 },
      statWeights: { Speed: 0.25, Stamina: 0.4, Power: 0.15, Guts: 0.12, Wit: 0.08 },
      aptitudeMultipliers: LONG_APTITUDE,
      normalizationBand: { floor: 0.76, width: 0.4 },
      phaseBoundaries: { mid: 0.05, final: 0.4, sprint: 0.7 },
      styleAdjustments: {
        FrontRunner: { Start: 0.1, Mid: -0.05, Final: -0.15, Sprint: -0.15 },
        PaceChaser: { Start: 0.03, Mid: 0.06, Final: 0.04, Sprint: 0.04 },
        LateSurger: { Start: -0.08, Mid: 0.04, Final: 0.15, Sprint: 0.15 },
        EndCloser: { Start: -0.15, Mid: -0.08, Final: 0.25, Sprint: 0.25 },
      },
      fatigueRates: { Start: 0.003, Mid: 0.004, Final: 0.005, Sprint: 0.007 },
    },
  },
  performance: {
    // 각 각질이 중요하게 보는 스탯 순서 (앞일수록 큰 배율)
    stylePriorities: {
      FrontRunner: ['Speed', 'Wit', 'Power', 'Guts', 'Stamina'],
      PaceChaser: ['Speed', 'Power', 'Wit', 'Guts', 'Stamina'],
      LateSurger: ['Speed', 'Power', 'Wit', 'Stamina', 'Guts'],
      EndCloser: ['Speed', 'Power', 'Wit', 'Stamina', 'Guts'],
    },
    priorityMultipliers: [1.2, 1.15, 1.1, 1.05, 1.0],
    statSoftCap: 1200,
    trackPenalties: {
      Turf: {
        Firm: { Speed: 0, Power: 0 },
        Good: { Speed: 0, Power: 50 },
        Soft: { Speed: 0, Power: 50 },
        Heavy: { Speed: 50, Power: 50 },
      },
      Dirt: {
        Firm: { Speed: 0, Power: 100 },
        Good: { Speed: 0, Power: 50 },
        Soft: { Speed: 0, Power: 100 },
        Heavy: { Speed: 50, Power: 100 },
      },
    },
  },
  speed: {
    finalPhasePremium: 1.02,
    fatiguePenaltyPerUnit: 0.04,
    fatiguePenaltyCap: 0.15,
    freshness: {
      steps: [
        { below: 0.2, multiplier: 0.9 },
        { below: 0.4, multiplier: 0.95 },
        { below: 0.6, multiplier: 0.98 },
        { below: 0.8, multiplier: 1.0 },
      ],
      otherwise: 1.02,
    },
    effectiveStamina: {
      steps: [
        { below: 0.1, multiplier: 0.9 },
        { below: 0.3, multiplier: 0.94 },
        { below: 0.5, multiplier: 0.97 },
        { below: 0.7, multiplier: 0.99 },
      ],
      otherwise: 1.0,
    },
    effectiveStaminaBase: 0.7,
    gutsEfficiencyDivisor: 1000,
    jitterAmplitude: 0.02,
    floorFraction: 0.85,
    ceilingFraction: 1.5,
  },
  stamina: {
    raceFloor: 1,
    baseDrain: 0.03,
    phaseDrainMultipliers: { Start: 0.6, Mid: 0.8, Final: 1.0, Sprint: 1.2 },
    fatigueFeedback: 0.08,
    gutsDivisor: 600,
    gutsScale: 0.6,
    minDrainFactor: 0.4,
    staminaDivisor: 500,
    staminaScale: 0.5,
    minFatigueFactor: 0.3,
    trackDrainMultipliers: { Firm: 1.0, Good: 1.0, Soft: 1.02, Heavy: 1.02 },
  },
  incidents: {
    warmupTicks: 40,
    baseChance: 0.0005,
    witDivisor: 200000,
    minChance: 0.0001,
    gateChance: 0.1,
    styleFactors: { FrontRunner: 1.1, PaceChaser: 1.0, LateSurger: 1.0, EndCloser: 0.9 },
    brackets: [
      { untilProgress: 0.1, kinds: [{ kind: 'slowStart', durationTicks: 20, speedMultiplier: 0.95 }] },
      {
        untilProgress: 0.4,
        kinds: [
          { kind: 'stumble', durationTicks: 20, speedMultiplier: 0.96 },
          { kind: 'crowded', durationTicks: 20, speedMultiplier: 0.95 },
          { kind: 'blocked', durationTicks: 20, speedMultiplier: 0.94 },
        ],
      },
      {
        untilProgress: 0.7,
        kinds: [
          { kind: 'staminaDrain', durationTicks: 40, speedMultiplier: 0.97 },
          { kind: 'positionLoss', durationTicks: 20, speedMultiplier: 0.98 },
        ],
      },
      {
        untilProgress: Number.POSITIVE_INFINITY,
        kinds: [
          { kind: 'finalStruggle', durationTicks: 20, speedMultiplier: 0.96 },
          { kind: 'exhaustion', durationTicks: 40, speedMultiplier: 0.92 },
        ],
      },
    ],
    momentumPenalty: 0.08,
    // 페널티를 되돌리고 0.01 만큼 더 얹어준다.
    momentumRebound: 0.09,
  },
  dnf: {
    windowMin: 0.4,
    windowMax: 0.85,
    gateChance: 0.05,
    baseChance: 0.00001,
    deficitThreshold: 100,
    perPointPenalty: 0.000001,
    worstGrade: 'G',
    worstGradeBonus: 0.001,
    lowStatThreshold: 80,
    lowStatBonus: 0.002,
    maxChance: 0.005,
  },
  duel: {
    windowMin: 0.5,
    windowMax: 0.85,
    proximityMeters: 5,
    gutsDivisor: 200,
    maxGutsChance: 0.7,
    midPackMin: 0.3,
    midPackMax: 0.7,
    midPackFactor: 1.5,
    baseChance: 0.1,
    staminaTopUpDivisor: 10,
    staminaTopUpCap: 20,
    momentumTiers: [
      { gutsAbove: 800, boost: 0.15 },
      { gutsAbove: 600, boost: 0.1 },
      { gutsAbove: 400, boost: 0.05 },
    ],
  },
  momentum: {
    min: 0.8,
    max: 1.3,
    overtakeGain: 0.002,
    // 기준 tick마다 1.0 쪽으로 돌아가는 양
    decayPerTick: 0.0005,
  },
}
