import React from 'react';
import type { LogLevel, LoggerState } from '../services/logger';
import { createStatusBarComponent } from './StatusBar';
import type { InkModule } from './inkTypes';

/**
 * Props supplied to the Ink root component.
 */
export interface AppProps {
  state: LoggerState;
  header?: string;
}

/**
 * Renders the stderr dashboard: header, current fetch, log stream and totals.
 */
export function createApp(ink: InkModule): React.FC<AppProps> {
  const { Box, Text, Newline } = ink;
  const StatusBar = createStatusBarComponent(ink);

  const App: React.FC<AppProps> = ({ state, header }) => {
    const warnings = state.globalLogs.filter(entry => entry.level === 'warn').length;
    const errors = state.globalLogs.filter(entry => entry.level === 'error').length;

    return (
      <Box flexDirection="column" padding={1} width="100%">
        <Text bold>{header ?? 'GitLab Toolbox'}</Text>
        {state.globalProgress && (
          <Box marginTop={1} flexDirection="column">
            <Text>
              {state.globalProgress.label ?? 'In progress'}: {formatGlobalProgress(state.globalProgress.current, state.globalProgress.total)}
            </Text>
            {state.globalProgress.total !== undefined && state.globalProgress.total > 0 && (
              <Text>{renderProgressBar(state.globalProgress.current, state.globalProgress.total)}</Text>
            )}
          </Box>
        )}
        {state.globalLogs.length > 0 && (
          <Box marginTop={1} flexDirection="column">
            {state.globalLogs.map(entry => (
              <Text key={entry.id} color={mapLogLevelToColor(entry.level)} dimColor={entry.level === 'debug'}>
                {formatLogEntry(entry.message, entry.timestamp)}
              </Text>
            ))}
          </Box>
        )}
        <Newline />
        <StatusBar pages={state.pagesFetched} records={state.recordsFetched} warnings={warnings} errors={errors} />
      </Box>
    );
  };

  return App;
}

export function formatGlobalProgress(current: number, total?: number): string {
  if (!total || total <= 0) {
    return `${current}`;
  }

  return `${current}/${total} (${Math.round(Math.min(current / total, 1) * 100)}%)`;
}

export function renderProgressBar(current: number, total: number): string {
  const width = 24;
  const ratio = Math.min(current / Math.max(total, 1), 1);
  const filled = Math.round(ratio * width);
  const empty = Math.max(width - filled, 0);
  return `[${'█'.repeat(filled)}${'░'.repeat(empty)}]`;
}

function mapLogLevelToColor(level: LogLevel): string | undefined {
  switch (level) {
    case 'warn':
      return 'yellow';
    case 'error':
      return 'red';
    default:
      return undefined;
  }
}

function formatLogEntry(message: string, timestamp: string): string {
  return `[${new Date(timestamp).toLocaleTimeString()}] ${message}`;
}
