export * from './types.js'
export * from './errors.js'
export { parseManifest, decodeManifest } from './parsers/pip/requirements.js'
export { OsvClient, DEFAULT_OSV_ENDPOINT, type OsvClientOptions } from './collectors/vulns/osv.js'
export { SeedLookupClient, loadSeedVulnerabilities } from './collectors/vulns/seed.js'
export { scanManifest, scanDependencies, DEFAULT_SCAN_CONCURRENCY, type ScanOptions } from './scanner/index.js'
export { mapConcurrent } from './scanner/pool.js'
export { listDependencies, getDependency, listApplicationDependencies } from './aggregate/index.js'
