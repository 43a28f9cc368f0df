/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { Text } from 'ink';

export function Success({ message }: { message: string }) {
  return <Text color="green">✓ {message}</Text>;
}
