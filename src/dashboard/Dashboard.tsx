import React, { useCallback, useEffect, useState } from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import { StatusBar } from '../shared/components/StatusBar.js'
import { SpendingSummary, trendColor } from '../shared/components/SpendingSummary.js'
import { errorMessage } from '../shared/errors.js'
import { formatMoney } from '../shared/money.js'
import { formatTrend } from '../cli/commands/report.js'
import type { RunResult } from '../pipeline/report-sinks.js'
import type { CategoryAggregate, Provenance } from '../reporting/index.js'
import { scaleMonthBars } from './month-bars.js'

const MONTHS_SHOWN = 12
const BAR_WIDTH = 30

const SOURCE_LABELS: Record<Provenance, string> = {
  'remote-cache': 'Drive snapshot',
  'local-cache': 'local snapshot',
  'live-fetch': 'live',
}

interface DashboardProps {
  title: string
  /** Runs the pipeline; `preferCache` false forces a live fetch */
  load: (preferCache: boolean) => Promise<RunResult>
  preferCache: boolean
}

const CategoryTable = ({ categories, currencyCode }: { categories: CategoryAggregate[]; currencyCode: string | null }) => (
  <Box flexDirection="column" paddingX={1} marginTop={1}>
    <Box gap={1}>
      <Box width={24}>
        <Text dimColor bold>Category</Text>
      </Box>
      <Box width={14}>
        <Text dimColor bold>Spent</Text>
      </Box>
      <Box width={14}>
        <Text dimColor bold>Month Before</Text>
      </Box>
      <Text dimColor bold>Trend</Text>
    </Box>
    {categories.map((category) => (
      <Box key={category.name} gap={1}>
        <Box width={24}>
          <Text>{category.name.slice(0, 23)}</Text>
        </Box>
        <Box width={14}>
          <Text>{formatMoney(category.total, currencyCode ?? undefined)}</Text>
        </Box>
        <Box width={14}>
          <Text dimColor>{formatMoney(category.priorTotal, currencyCode ?? undefined)}</Text>
        </Box>
        <Text color={trendColor(category.trend)}>
          {formatTrend(category.trend)}
        </Text>
      </Box>
    ))}
    {categories.length === 0 && <Text dimColor>No expenses last month</Text>}
  </Box>
)

export const Dashboard = ({ title, load, preferCache }: DashboardProps) => {
  const { exit } = useApp()
  const [result, setResult] = useState<RunResult | null>(null)
  const [isLoading, setIsLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)

  const loadData = useCallback(
    async (useCache: boolean) => {
      setIsLoading(true)
      setError(null)
      try {
        setResult(await load(useCache))
      } catch (err) {
        setError(errorMessage(err))
      } finally {
        setIsLoading(false)
      }
    },
    [load]
  )

  // Initial load
  useEffect(() => {
    void loadData(preferCache)
  }, [loadData, preferCache])

  useInput((input) => {
    if (isLoading) return
    // Refresh from Splitwise
    if (input === 'r') {
      void loadData(false)
    }
    // Reload from snapshots
    if (input === 'c') {
      void loadData(true)
    }
    // Quit
    if (input === 'q') {
      exit()
    }
  })

  if (isLoading) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color="cyan">Loading expenses...</Text>
      </Box>
    )
  }

  if (error || !result) {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color="red">{error ?? 'No data loaded'}</Text>
        <Text dimColor>r retry live · c retry from snapshots · q quit</Text>
      </Box>
    )
  }

  const { dataset, report } = result
  const topCategory = report.topCategories[0] ?? null
  const bars = scaleMonthBars(report.months, MONTHS_SHOWN, BAR_WIDTH)

  return (
    <Box flexDirection="column">
      <StatusBar
        title={title}
        source={dataset.snapshot ? `${SOURCE_LABELS[dataset.provenance]} ${dataset.snapshot.name}` : SOURCE_LABELS[dataset.provenance]}
        recordCount={dataset.records.length}
        rejectedCount={dataset.rejected.length}
      />

      <SpendingSummary
        monthLabel={report.lastCompleteMonth.label}
        lastMonthTotal={report.lastMonthTotal}
        monthlyAverage={report.monthlyAverage}
        trend={report.trend}
        topCategory={topCategory ? { name: topCategory.name, total: topCategory.total } : null}
        currencyCode={report.currencyCode}
      />

      <CategoryTable categories={report.topCategories} currencyCode={report.currencyCode} />

      <Box flexDirection="column" paddingX={1} marginTop={1}>
        <Text dimColor bold>Monthly totals</Text>
        {bars.map((bar) => (
          <Box key={bar.key} gap={1}>
            <Text dimColor>{bar.key}</Text>
            <Text color={bar.key === report.lastCompleteMonth.key ? 'yellow' : 'cyan'}>
              {'█'.repeat(bar.filled).padEnd(BAR_WIDTH)}
            </Text>
            <Text>{formatMoney(bar.total, report.currencyCode ?? undefined)}</Text>
          </Box>
        ))}
      </Box>

      <Box marginTop={1} paddingX={1} gap={2}>
        <Text><Text color="cyan" bold>r</Text> <Text dimColor>refresh</Text></Text>
        <Text><Text color="cyan" bold>c</Text> <Text dimColor>from snapshots</Text></Text>
        <Text><Text color="cyan" bold>q</Text> <Text dimColor>quit</Text></Text>
      </Box>
    </Box>
  )
}
