// shared/race-core 공개 진입점
// 서버(functions)와 툴링에서 공통으로 쓰는 타입/계산을 export한다.
export * from './types-core'
export * from './constants-core'
export * from './tuning-core'
export * from './errors-core'
export * from './rng-core'
export * from './race-catalog-core'
export * from './profile-core'
export * from './stat-system-core'
export * from './phase-core'
export * from './speed-core'
export * from './stamina-core'
export * from './incident-core'
export * from './dnf-core'
export * from './duel-core'
export * from './ranking-core'
export * from './competitor-core'
export * from './race-engine-core'
export * from './script-builder'
