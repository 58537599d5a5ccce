export { BarChartView } from './BarChartView.js';
export { renderWithInk, type InkRenderOptions } from './render.js';
