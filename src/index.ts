export * from './contracts'
export { SnapshotLoader, stripWarningLine, DEFAULT_INPUT_CONFIG } from './snapshot/SnapshotLoader'
export { InventoryDiffer, classify, snapshotsEqual } from './snapshot/InventoryDiffer'
export { ConfigLoader } from './config/ConfigLoader'
export { ReportManager } from './decodiff/ReportManager'
export * from './formatting'
export * from './commands'
export { run, parseArgs, outputRequests } from './cli/decodiff'
