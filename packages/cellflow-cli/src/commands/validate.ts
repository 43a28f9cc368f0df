/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow validate command - Check a workflow description file
 *
 * Usage:
 *   cellflow validate workflow.yaml
 */

import { loadWorkflowDescription } from '@cellflow/core';
import { exitError, formatError } from '../utils.js';

/**
 * Validate a workflow description and print its stages and steps in order.
 */
export async function validateCommand(file: string): Promise<void> {
  try {
    const workflow = await loadWorkflowDescription(file, {
      onWarning: (message) => console.log(`Warning: ${message}`),
    });

    for (const stage of workflow.stages) {
      console.log(stage.name);
      for (const step of stage.steps) {
        console.log(`  ${step.name}`);
      }
    }
    console.log('');
    console.log(`Valid workflow: ${workflow.stages.length} stage(s)`);
  } catch (err) {
    exitError(formatError(err));
  }
}
