import type { Logger } from '../shared/logger.js'
import type { Dataset } from '../expenses/expense-types.js'
import type { StatisticsReport } from '../reporting/types.js'
import { encodeSnapshot, snapshotName } from '../snapshots/snapshot-codec.js'
import type { SnapshotStore } from '../snapshots/snapshot-store.js'
import { csvExportName, encodeCsvExport } from '../snapshots/csv-export.js'

export interface RunResult {
  dataset: Dataset
  report: StatisticsReport
}

/**
 * Consumer of a finished run. Sinks are only invoked after the dataset and
 * report were produced successfully.
 */
export interface ReportSink {
  readonly name: string
  deliver: (result: RunResult) => Promise<void>
}

/**
 * YYYY-MM-DD of the report's run date, used to name persisted files.
 */
export const runDate = (report: StatisticsReport): string => report.generatedAt.slice(0, 10)

/**
 * Writes the dataset as a dated snapshot. Only live fetches are written: a
 * dataset that came from a cache is already stored somewhere.
 */
export const createSnapshotSink = (store: SnapshotStore, logger: Logger): ReportSink => ({
  name: `snapshot (${store.label})`,
  deliver: async ({ dataset, report }) => {
    if (dataset.provenance !== 'live-fetch') {
      logger.debug(`Not writing a snapshot to ${store.label}: data came from ${dataset.provenance}`)
      return
    }
    const ref = await store.write(snapshotName(runDate(report)), encodeSnapshot(dataset.records))
    logger.info(`Saved snapshot ${ref.name} to ${store.label} (${dataset.records.length} records)`)
  },
})

/**
 * Writes the records as `YYYY-MM-DD_expenses.csv` next to the snapshot. Like
 * the snapshot, only live fetches are exported.
 */
export const createCsvExportSink = (store: SnapshotStore, logger: Logger): ReportSink => ({
  name: `CSV export (${store.label})`,
  deliver: async ({ dataset, report }) => {
    if (dataset.provenance !== 'live-fetch') {
      logger.debug(`Not writing a CSV export to ${store.label}: data came from ${dataset.provenance}`)
      return
    }
    const ref = await store.write(csvExportName(runDate(report)), encodeCsvExport(dataset.records))
    logger.info(`Saved CSV export ${ref.name} to ${store.label}`)
  },
})

/**
 * Writes the statistics report as `YYYY-MM-DD_report.json`.
 */
export const createReportFileSink = (store: SnapshotStore, logger: Logger): ReportSink => ({
  name: `report file (${store.label})`,
  deliver: async ({ dataset, report }) => {
    const content = `${JSON.stringify({ provenance: dataset.provenance, report }, null, 2)}\n`
    const ref = await store.write(`${runDate(report)}_report.json`, content)
    logger.info(`Saved report ${ref.name} to ${store.label}`)
  },
})

/**
 * Delivers to each sink in order. The first failure stops delivery and
 * propagates.
 */
export const deliverToSinks = async (sinks: readonly ReportSink[], result: RunResult, logger: Logger): Promise<void> => {
  for (const sink of sinks) {
    logger.debug(`Delivering to ${sink.name}`)
    await sink.deliver(result)
  }
}
