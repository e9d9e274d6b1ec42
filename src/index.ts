export { PipUpgradeInteractive, selectEligibleCandidates, type Collaborators } from './core/upgrade-runner'

export * from './types'
export * from './constants'
export * from './errors'
export * from './utils'
export * from './provenance-classifier'
export * from './progress-reporter'
export * from './interactive-ui'
export * from './upgrader'
export * from './services/metadata-registry'
export * from './services/conda-environment'
export * from './services/pip-outdated'
export * from './services/python-runtime'
