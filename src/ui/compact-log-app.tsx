/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { CompactLogOptions, CompactLogResult } from '../runner/index.js';
import { runCompactLog } from '../runner/index.js';
import type { ProcessingObserver } from '../types/index.js';

interface AppState {
  mode: string;
  outputs: string[];
  linesRead: number;
  recordsWritten: number;
  lastEvent: string;
}

const initialState: AppState = {
  mode: '...',
  outputs: [],
  linesRead: 0,
  recordsWritten: 0,
  lastEvent: 'Opening files...',
};

export interface CompactLogAppProps {
  options: CompactLogOptions;
}

export const CompactLogApp: React.FC<CompactLogAppProps> = ({ options }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<CompactLogResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: ProcessingObserver = {
      onStart: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          mode: info.mode,
          outputs: info.outputPaths,
          lastEvent: `Reading ${info.inputPath}`,
        }));
      },

      onProgress: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          linesRead: info.linesRead,
          recordsWritten: info.recordsWritten,
          lastEvent: `Read ${info.linesRead} lines`,
        }));
      },
    };

    runCompactLog({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
        setState((prev) => ({
          ...prev,
          linesRead: res.linesRead,
          recordsWritten: res.recordsWritten,
          lastEvent: 'Done',
        }));
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          LOG COMPACTOR
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Mode: </Text>
          <Text color="cyan">{state.mode}</Text>
          <Text dimColor> | Input: </Text>
          <Text color="white">{options.inputPath}</Text>
        </Box>
        <Box>
          <Text dimColor>Lines read: </Text>
          <Text color="greenBright">{state.linesRead}</Text>
          <Text dimColor> | Records written: </Text>
          <Text color="yellow">{state.recordsWritten}</Text>
        </Box>
        {state.outputs.map((output) => (
          <Text key={output} dimColor>
            → {output}
          </Text>
        ))}
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {result && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Processed {result.linesRead} lines | Wrote {result.recordsWritten} records
          </Text>
          {result.keywordCounts &&
            Object.entries(result.keywordCounts).map(([keyword, count]) => (
              <Text key={keyword}>
                <Text color="cyan">{keyword}</Text>: {count} lines
              </Text>
            ))}
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};
