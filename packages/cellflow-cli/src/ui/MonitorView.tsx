/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Live status table of a submission
 */

import { Box, Text } from 'ink';
import { countStates, formatStatusTable, isFailed, type ProgressReport } from '@cellflow/core';
import type { JobStatusRow } from '@cellflow/types';

export interface MonitorViewProps {
  submissionId: number;
  step: string;
  /** Latest report, null before the first poll */
  report: ProgressReport | null;
}

function rowColor(row: JobStatusRow): string {
  if (isFailed(row)) return 'red';
  switch (row.state) {
    case 'terminated':
      return 'green';
    case 'running':
      return 'cyan';
    default:
      return 'gray';
  }
}

export function MonitorView({ submissionId, step, report }: MonitorViewProps) {
  if (report === null) {
    return <Text dimColor>Waiting for status of submission {submissionId} ({step})...</Text>;
  }

  const counts = countStates(report.rows);
  const [header = '', ...lines] = formatStatusTable(report.rows).split('\n');

  return (
    <Box flexDirection="column">
      <Box borderStyle="single" borderColor="cyan" paddingX={1}>
        <Text bold color="cyan">
          Submission {report.submissionId} ({report.step}): {report.state}
        </Text>
        <Text dimColor> poll {report.iteration}</Text>
      </Box>
      <Text bold>{header}</Text>
      {lines.map((line, i) => {
        const row = report.rows[i];
        return (
          <Text key={row?.name ?? i} color={row ? rowColor(row) : undefined}>
            {line}
          </Text>
        );
      })}
      <Text dimColor>
        {counts.terminated} terminated, {counts.stopped} stopped, {counts.running} running,{' '}
        {counts.submitted + counts.created} queued
      </Text>
    </Box>
  );
}
