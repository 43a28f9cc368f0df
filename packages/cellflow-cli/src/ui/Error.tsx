/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { Box, Text } from 'ink';

export interface ErrorProps {
  message: string;
  details?: string[];
}

/**
 * Error message with optional detail lines
 */
export function Error({ message, details = [] }: ErrorProps) {
  return (
    <Box flexDirection="column">
      <Text color="red" bold>
        ✗ {message}
      </Text>
      {details.map((line, i) => (
        <Text key={i} color="gray">
          {'  '}
          {line}
        </Text>
      ))}
    </Box>
  );
}
