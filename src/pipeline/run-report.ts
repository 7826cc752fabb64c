import type { AppConfig } from '../config/config-types.js'
import { requireApiKey } from '../config/config-loader.js'
import type { Logger } from '../shared/logger.js'
import { createSplitwiseSources } from '../shared/splitwise-client.js'
import { fetchAllGroups, type LedgerSource } from '../fetching/paginator.js'
import { exponentialBackoff, realSleep, type Sleep } from '../fetching/retry-policy.js'
import { computeStatistics } from '../reporting/statistics-engine.js'
import { resolveDataset } from '../snapshots/source-resolver.js'
import { createLocalSnapshotStore } from '../snapshots/local-snapshot-store.js'
import { createDriveSnapshotStore } from '../snapshots/drive-snapshot-store.js'
import type { SnapshotStore } from '../snapshots/snapshot-store.js'
import {
  createCsvExportSink,
  createReportFileSink,
  createSnapshotSink,
  deliverToSinks,
  type ReportSink,
  type RunResult,
} from './report-sinks.js'

export interface RunOptions {
  /** Use cached snapshots before fetching live */
  preferCache: boolean
  /** Upload the snapshot to the remote store */
  upload: boolean
  /** Write snapshot and report files to the local store */
  save: boolean
  topCategories?: number
}

export interface RunDependencies {
  config: AppConfig
  logger: Logger
  now: Date
  remote: SnapshotStore | null
  local: SnapshotStore | null
  /** Builds the ledger sources; may throw ConfigError */
  createSources: () => LedgerSource[]
  sleep: Sleep
}

/**
 * Wires the real collaborators from config: Splitwise sources, the local
 * output directory, and Google Drive when configured.
 */
export const createRunDependencies = (config: AppConfig, logger: Logger, now = new Date()): RunDependencies => ({
  config,
  logger,
  now,
  local: createLocalSnapshotStore(config.storage.outputDir),
  remote: config.drive ? createDriveSnapshotStore({ ...config.drive, timeoutMs: config.splitwise.timeoutMs }) : null,
  createSources: () =>
    createSplitwiseSources({
      apiKey: requireApiKey(config),
      groupIds: config.splitwise.groupIds,
      timeoutMs: config.splitwise.timeoutMs,
    }),
  sleep: realSleep,
})

/**
 * Resolves the dataset and computes statistics. Nothing is persisted here.
 *
 * With the cache disabled a live fetch is mandatory, so a missing API key is
 * reported before any store is touched.
 */
export const runReport = async (options: RunOptions, deps: RunDependencies): Promise<RunResult> => {
  const { config, logger, now } = deps

  if (!options.preferCache) {
    requireApiKey(config)
    logger.info('Mode: live (fresh fetch from Splitwise)')
  } else {
    logger.info('Mode: cached (use snapshots when available)')
  }

  const fetchLive = async () => {
    const sources = deps.createSources()
    return fetchAllGroups(sources, {
      pageSize: config.splitwise.pageSize,
      maxRecords: config.splitwise.maxRecords,
      retryPolicy: exponentialBackoff(config.retry),
      sleep: deps.sleep,
      logger,
    })
  }

  const dataset = await resolveDataset({
    preferCache: options.preferCache,
    remote: deps.remote,
    local: deps.local,
    fetchLive,
    logger,
  })

  if (dataset.rejected.length > 0) {
    logger.warn(`${dataset.rejected.length} ledger entries were skipped as malformed`)
  }

  const report = computeStatistics(dataset, {
    now,
    topCategories: options.topCategories ?? config.reporting.topCategories,
  })
  logger.debug(
    `Statistics: ${report.lastCompleteMonth.label} total ${report.lastMonthTotal}, ${report.totalMonths} months`
  )

  return { dataset, report }
}

/**
 * Sinks for a successful run, per the persistence options.
 */
export const buildSinks = (options: RunOptions, deps: RunDependencies): ReportSink[] => {
  const sinks: ReportSink[] = []

  if (options.save && deps.local) {
    sinks.push(
      createSnapshotSink(deps.local, deps.logger),
      createCsvExportSink(deps.local, deps.logger),
      createReportFileSink(deps.local, deps.logger)
    )
  }

  if (options.upload) {
    if (deps.remote) {
      sinks.push(createSnapshotSink(deps.remote, deps.logger), createCsvExportSink(deps.remote, deps.logger))
    } else {
      deps.logger.info('Google Drive not configured, skipping upload')
    }
  }

  return sinks
}

/**
 * Full run: resolve, compute, then persist. A failure anywhere before
 * persistence leaves every stored snapshot and report untouched.
 */
export const runAndPersist = async (options: RunOptions, deps: RunDependencies): Promise<RunResult> => {
  const result = await runReport(options, deps)
  await deliverToSinks(buildSinks(options, deps), result, deps.logger)
  return result
}
