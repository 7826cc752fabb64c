import React from 'react'
import { render } from 'ink'
import type { DashboardOptions } from '../args.js'
import type { AppConfig } from '../../config/config-types.js'
import { Dashboard } from '../../dashboard/Dashboard.js'
import { runAndPersist, type RunDependencies } from '../../pipeline/run-report.js'

/**
 * Interactive dashboard. Live fetches are saved as local snapshots so the
 * next start can load from cache; nothing is uploaded.
 *
 * @example
 * ledger-digest dashboard --local
 */
export const dashboardCommand = async (
  options: DashboardOptions,
  config: AppConfig,
  deps: RunDependencies
): Promise<void> => {
  const load = (preferCache: boolean) =>
    runAndPersist({ preferCache, upload: false, save: true, topCategories: options.top }, deps)

  const instance = render(
    <Dashboard title={config.reporting.title} load={load} preferCache={options.local} />
  )
  await instance.waitUntilExit()
}
