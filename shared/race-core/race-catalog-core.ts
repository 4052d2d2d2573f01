import catalog from './data/races.json'
import { RACE_TYPES, SURFACES } from './constants-core'
import { RaceSetupError } from './errors-core'
import type { RaceConfig, RaceType, Surface, TrackCondition } from './types-core'

// JRA G1 레이스 목록 (거리/타입/주로/경마장)
export type CatalogRace = {
  id: string
  name: string
  distance: number
  raceType: RaceType
  surface: Surface
  racecourse: string
  direction: 'Left' | 'Right'
  month: number
  grade: string
}

export type CatalogFilter = {
  raceType?: RaceType
  surface?: Surface
  racecourse?: string
  month?: number
}

function isRaceType(value: string): value is RaceType {
  return RACE_TYPES.some((raceType) => raceType === value)
}

function isSurface(value: string): value is Surface {
  return SURFACES.some((surface) => surface === value)
}

// json은 문자열로 읽히기 때문에 한 번 좁혀서 들고 있는다.
const CATALOG: readonly CatalogRace[] = catalog.map((entry) => {
  if (!isRaceType(entry.raceType) || !isSurface(entry.surface)) {
    throw new RaceSetupError('unknownRace', `Malformed catalog entry ${entry.id}`)
  }
  return {
    ...entry,
    raceType: entry.raceType,
    surface: entry.surface,
    direction: entry.direction === 'Left' ? 'Left' : 'Right',
  }
})

export function raceTypeForDistance(distance: number): RaceType {
  if (distance <= 1400) return 'Sprint'
  if (distance <= 1800) return 'Mile'
  if (distance <= 2400) return 'Medium'
  return 'Long'
}

export function listRaces(filter: CatalogFilter = {}): CatalogRace[] {
  return CATALOG.filter(
    (race) =>
      (filter.raceType === undefined || race.raceType === filter.raceType) &&
      (filter.surface === undefined || race.surface === filter.surface) &&
      (filter.racecourse === undefined || race.racecourse === filter.racecourse) &&
      (filter.month === undefined || race.month === filter.month),
  )
}

export function getRaceById(raceId: string): CatalogRace | null {
  return CATALOG.find((race) => race.id === raceId) ?? null
}

export function raceConfigFromCatalog(raceId: string, trackCondition: TrackCondition = 'Good'): RaceConfig {
  const race = getRaceById(raceId)
  if (!race) {
    throw new RaceSetupError('unknownRace', `Race ${raceId} not found in catalog`)
  }
  return {
    distance: race.distance,
    raceType: race.raceType,
    surface: race.surface,
    trackCondition,
  }
}
