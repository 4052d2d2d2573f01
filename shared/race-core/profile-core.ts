import { APTITUDE_GRADES, RACE_TYPES, STAT_NAMES, SURFACES, TRACK_CONDITIONS } from './constants-core'
import { RaceSetupError } from './errors-core'
import { raceTypeForDistance } from './race-catalog-core'
import type {
  AptitudeGrade,
  CompetitorInput,
  CompetitorProfile,
  RaceConfig,
  RaceConfigInput,
  RunningStyle,
  SetupWarning,
  Stats,
  Surface,
  TrackCondition,
} from './types-core'

// 외부 설정(json 등)에서 들어온 레이스/참가자 입력을 엔진이 쓰는 형태로 정리한다.
// 치명적인 문제(거리, 빈 출주표)는 던지고, 나머지는 기본값으로 바꾸고 warning만 남긴다.
export const NEUTRAL_GRADE: AptitudeGrade = 'B'
export const NEUTRAL_STYLE: RunningStyle = 'PaceChaser'

// 예전 설정 파일은 FR/PC/LS/EC 약어를 쓴다.
const RUNNING_STYLE_ALIASES: Record<string, RunningStyle> = {
  frontrunner: 'FrontRunner',
  fr: 'FrontRunner',
  pacechaser: 'PaceChaser',
  pc: 'PaceChaser',
  latesurger: 'LateSurger',
  ls: 'LateSurger',
  endcloser: 'EndCloser',
  ec: 'EndCloser',
}

function matchOption<T extends string>(options: readonly T[], raw: string): T | undefined {
  const needle = raw.trim().toLowerCase()
  return options.find((option) => option.toLowerCase() === needle)
}

export function parseRunningStyle(raw: string | undefined): RunningStyle | undefined {
  if (raw === undefined) return undefined
  const key = raw.trim().toLowerCase().replace(/[\s_-]/g, '')
  return RUNNING_STYLE_ALIASES[key]
}

export function parseAptitudeGrade(raw: string | undefined): AptitudeGrade | undefined {
  if (raw === undefined) return undefined
  return matchOption(APTITUDE_GRADES, raw)
}

export function normalizeRaceConfig(input: RaceConfigInput, warnings: SetupWarning[]): RaceConfig {
  const { distance } = input
  if (typeof distance !== 'number' || !Number.isFinite(distance) || distance <= 0) {
    throw new RaceSetupError('invalidDistance', `Race distance must be a positive number (got ${String(distance)})`)
  }

  let raceType = raceTypeForDistance(distance)
  if (input.raceType !== undefined) {
    const parsed = matchOption(RACE_TYPES, input.raceType)
    if (parsed) {
      raceType = parsed
    } else {
      warnings.push({
        code: 'unknownRaceType',
        message: `Unknown race type "${input.raceType}", using ${raceType} from distance`,
        field: 'raceType',
        value: input.raceType,
      })
    }
  }

  let surface: Surface = 'Turf'
  if (input.surface !== undefined) {
    const parsed = matchOption(SURFACES, input.surface)
    if (parsed) {
      surface = parsed
    } else {
      warnings.push({
        code: 'unknownSurface',
        message: `Unknown surface "${input.surface}", using Turf`,
        field: 'surface',
        value: input.surface,
      })
    }
  }

  let trackCondition: TrackCondition = 'Good'
  if (input.trackCondition !== undefined) {
    const parsed = matchOption(TRACK_CONDITIONS, input.trackCondition)
    if (parsed) {
      trackCondition = parsed
    } else {
      warnings.push({
        code: 'unknownTrackCondition',
        message: `Unknown track condition "${input.trackCondition}", using Good`,
        field: 'trackCondition',
        value: input.trackCondition,
      })
    }
  }

  return { distance, raceType, surface, trackCondition }
}

function normalizeStats(input: CompetitorInput, name: string, warnings: SetupWarning[]): Stats {
  const stats: Stats = { Speed: 0, Stamina: 0, Power: 0, Guts: 0, Wit: 0 }
  for (const stat of STAT_NAMES) {
    const raw = input.stats?.[stat]
    if (typeof raw !== 'number' || !Number.isFinite(raw)) {
      warnings.push({
        code: 'missingStat',
        message: `${name}: ${stat} is missing, using 0`,
        competitorName: name,
        field: stat,
        value: raw,
      })
      continue
    }
    if (raw < 0) {
      warnings.push({
        code: 'negativeStat',
        message: `${name}: ${stat} ${raw} clamped to 0`,
        competitorName: name,
        field: stat,
        value: raw,
      })
      continue
    }
    if (!Number.isInteger(raw)) {
      warnings.push({
        code: 'nonIntegerStat',
        message: `${name}: ${stat} ${raw} rounded to ${Math.round(raw)}`,
        competitorName: name,
        field: stat,
        value: raw,
      })
    }
    stats[stat] = Math.round(raw)
  }
  return stats
}

function gradeReader(
  raw: Partial<Record<string, string>> | undefined,
  name: string,
  field: string,
  warnings: SetupWarning[],
): (key: string) => AptitudeGrade {
  return (key) => {
    const value = raw?.[key]
    const grade = parseAptitudeGrade(value)
    if (value !== undefined && !grade) {
      warnings.push({
        code: 'unknownAptitudeGrade',
        message: `${name}: unknown ${field}.${key} grade "${value}", using ${NEUTRAL_GRADE}`,
        competitorName: name,
        field: `${field}.${key}`,
        value,
      })
    }
    return grade ?? NEUTRAL_GRADE
  }
}

export function normalizeCompetitors(
  inputs: readonly CompetitorInput[],
  warnings: SetupWarning[],
): CompetitorProfile[] {
  if (inputs.length === 0) {
    throw new RaceSetupError('emptyField', 'At least one competitor is required')
  }

  return inputs.map((input, id) => {
    let name = typeof input.name === 'string' ? input.name.trim() : ''
    if (name.length === 0) {
      name = `Competitor ${id + 1}`
      warnings.push({
        code: 'missingName',
        message: `Competitor #${id + 1} has no name, using "${name}"`,
        competitorName: name,
        field: 'name',
        value: input.name,
      })
    }

    let runningStyle = parseRunningStyle(input.runningStyle)
    if (!runningStyle) {
      // 각질이 없거나 모르는 값이면 중립(선행)으로 본다.
      if (input.runningStyle !== undefined) {
        warnings.push({
          code: 'unknownRunningStyle',
          message: `${name}: unknown running style "${input.runningStyle}", using ${NEUTRAL_STYLE}`,
          competitorName: name,
          field: 'runningStyle',
          value: input.runningStyle,
        })
      }
      runningStyle = NEUTRAL_STYLE
    }

    const stats = normalizeStats(input, name, warnings)
    const distanceGrade = gradeReader(input.distanceAptitude, name, 'distanceAptitude', warnings)
    const surfaceGrade = gradeReader(input.surfaceAptitude, name, 'surfaceAptitude', warnings)

    return {
      id,
      name,
      stats,
      runningStyle,
      distanceAptitude: {
        Sprint: distanceGrade('Sprint'),
        Mile: distanceGrade('Mile'),
        Medium: distanceGrade('Medium'),
        Long: distanceGrade('Long'),
      },
      surfaceAptitude: {
        Turf: surfaceGrade('Turf'),
        Dirt: surfaceGrade('Dirt'),
      },
    }
  })
}

// 이름 -> id 조회표. 이름이 겹치면 먼저 등록된 쪽을 쓴다.
export function buildNameIndex(profiles: readonly CompetitorProfile[], warnings: SetupWarning[]): Map<string, number> {
  const index = new Map<string, number>()
  for (const profile of profiles) {
    if (index.has(profile.name)) {
      warnings.push({
        code: 'duplicateName',
        message: `Duplicate competitor name "${profile.name}", lookups resolve to the first entry`,
        competitorName: profile.name,
        field: 'name',
        value: profile.id,
      })
      continue
    }
    index.set(profile.name, profile.id)
  }
  return index
}
