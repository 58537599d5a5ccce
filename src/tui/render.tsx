import { render } from 'ink';
import React from 'react';
import type { Renderable } from '../render/segment.js';
import { BarChartView } from './BarChartView.js';

export interface InkRenderOptions {
  stdout: NodeJS.WriteStream;
  width?: number;
  height?: number;
}

/**
 * Render a chart once through Ink and wait for Ink to flush it.
 */
export async function renderWithInk(chart: Renderable, options: InkRenderOptions): Promise<void> {
  const instance = render(
    <BarChartView chart={chart} width={options.width} height={options.height} />,
    { stdout: options.stdout, patchConsole: false, exitOnCtrlC: false }
  );
  instance.unmount();
  await instance.waitUntilExit();
}
