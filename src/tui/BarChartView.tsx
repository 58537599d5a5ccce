import { Box, Text, useStdout } from 'ink';
import React, { useMemo } from 'react';
import type { Renderable } from '../render/segment.js';
import { splitLines, type Segment } from '../render/segment.js';
import type { Color, Style } from '../render/style.js';
import { foregroundName } from '../render/ansi.js';

interface BarChartViewProps {
  chart: Renderable;
  /** Overrides the terminal's column count */
  width?: number;
  /** Overrides the terminal's row count */
  height?: number;
}

function inkColor(color: Color | undefined): string | undefined {
  if (!color) return undefined;
  return color.type === 'hex' ? color.hex : foregroundName(color);
}

function StyledSegment({ text, style }: Segment): React.ReactElement {
  const s: Style = style ?? {};
  return (
    <Text
      color={inkColor(s.color)}
      backgroundColor={inkColor(s.bgcolor)}
      bold={s.bold}
      dimColor={s.dim}
      italic={s.italic}
      underline={s.underline}
      strikethrough={s.strike}
      inverse={s.reverse}
    >
      {text}
    </Text>
  );
}

/**
 * Ink host for a chart: one `<Text>` row per rendered line.
 */
export function BarChartView({ chart, width, height }: BarChartViewProps): React.ReactElement {
  const { stdout } = useStdout();
  const maxWidth = width ?? stdout.columns ?? 80;
  const rows = height ?? stdout.rows;

  const lines = useMemo(
    () => splitLines(chart.render({ maxWidth, height: rows })),
    [chart, maxWidth, rows]
  );

  return (
    <Box flexDirection="column">
      {lines.map((line, idx) => (
        <Text key={idx}>
          {line.map((seg, segIdx) => (
            <StyledSegment key={segIdx} text={seg.text} style={seg.style} />
          ))}
        </Text>
      ))}
    </Box>
  );
}
