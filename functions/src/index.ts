import { logger } from 'firebase-functions'
import { logSetupWarning } from './common/logging'
import { createRaceSimulationCallables } from './domains/race-simulation'

const FUNCTIONS_REGION = 'asia-northeast3'
// 한 레이스 최대 출주 수
const MAX_FIELD_SIZE = 18

// ==================== 레이스 시뮬레이션 ====================

const raceSimulationCallables = createRaceSimulationCallables({
  logger,
  onSetupWarning: logSetupWarning,
  region: FUNCTIONS_REGION,
  maxFieldSize: MAX_FIELD_SIZE,
})

export const simulateRace = raceSimulationCallables.simulateRace
export const listCatalogRaces = raceSimulationCallables.listCatalogRaces
