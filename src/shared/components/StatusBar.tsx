import React from 'react'
import { Box, Text } from 'ink'

interface StatusBarProps {
  title: string
  source: string
  recordCount: number
  rejectedCount: number
}

export const StatusBar = ({ title, source, recordCount, rejectedCount }: StatusBarProps) => (
  <Box
    borderStyle="single"
    borderColor="gray"
    paddingX={1}
    justifyContent="space-between"
  >
    <Text>
      <Text bold color="green">
        {title}
      </Text>
      <Text dimColor> · {source}</Text>
    </Text>
    <Text dimColor>
      {rejectedCount > 0 && (
        <Text color="yellow">{rejectedCount} skipped</Text>
      )}
      {rejectedCount > 0 && ' · '}
      {recordCount} records
    </Text>
  </Box>
)
