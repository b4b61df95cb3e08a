import React from 'react';
import type { InkModule } from './inkTypes';

/**
 * Props accepted by the {@link StatusBar} component.
 */
export interface StatusBarProps {
  pages: number;
  records: number;
  warnings: number;
  errors: number;
}

/**
 * Displays fetch totals at the bottom of the dashboard.
 */
export function createStatusBarComponent(ink: InkModule): React.FC<StatusBarProps> {
  const { Box, Text } = ink;

  const StatusBar: React.FC<StatusBarProps> = ({ pages, records, warnings, errors }) => (
    <Box borderStyle="single" paddingX={1} paddingY={0} marginTop={1} flexDirection="column">
      <Text>
        Pages: {pages} • Records: {records}
      </Text>
      <Text dimColor>
        Warnings: {warnings} • Errors: {errors}
      </Text>
    </Box>
  );

  return StatusBar;
}
