import React from 'react'
import { Box, Text } from 'ink'
import { formatCompactMoney } from '../money.js'
import type { Trend } from '../../reporting/index.js'

interface SpendingSummaryProps {
  monthLabel: string
  lastMonthTotal: number
  monthlyAverage: number
  trend: Trend
  topCategory: { name: string; total: number } | null
  currencyCode: string | null
}

/**
 * Spending up is red, down is green.
 */
export const trendColor = (trend: Trend): string => {
  switch (trend.direction) {
    case 'up':
      return 'red'
    case 'down':
      return 'green'
    case 'new':
      return 'yellow'
    default:
      return 'gray'
  }
}

export const trendArrow = (trend: Trend): string => {
  switch (trend.direction) {
    case 'up':
      return `▲ ${trend.percent.toFixed(1)}%`
    case 'down':
      return `▼ ${Math.abs(trend.percent).toFixed(1)}%`
    case 'stable':
      return `= ${trend.percent.toFixed(1)}%`
    case 'new':
      return 'new'
    case 'undefined':
      return '-'
  }
}

export const SpendingSummary = ({
  monthLabel,
  lastMonthTotal,
  monthlyAverage,
  trend,
  topCategory,
  currencyCode,
}: SpendingSummaryProps) => {
  const money = (milliunits: number) => formatCompactMoney(milliunits, currencyCode ?? undefined)

  return (
    <Box paddingX={1} gap={3} borderStyle="single" borderColor="gray" borderTop={false} borderLeft={false} borderRight={false}>
      <Box gap={1}>
        <Text dimColor>{monthLabel}:</Text>
        <Text color="red" bold>{money(lastMonthTotal)}</Text>
      </Box>

      <Box gap={1}>
        <Text dimColor>Average:</Text>
        <Text bold>{money(monthlyAverage)}</Text>
      </Box>

      <Box gap={1}>
        <Text dimColor>Trend:</Text>
        <Text color={trendColor(trend)} bold>
          {trendArrow(trend)}
        </Text>
      </Box>

      {topCategory && (
        <Box gap={1}>
          <Text dimColor>Top:</Text>
          <Text color="yellow">{topCategory.name.slice(0, 12)}</Text>
          <Text dimColor>({money(topCategory.total)})</Text>
        </Box>
      )}
    </Box>
  )
}
