// Use cases
export { buildChart, type BuildChartDeps } from './core/usecases/build-chart.js';
export { buildAlignedChart, buildCalendarChart } from './core/usecases/build-chart-data.js';
export { validatePlotOptions } from './core/options.js';
export { formatValue } from './core/format.js';

// Ports
export type { ChartRenderer } from './core/ports.js';

// Renderer
export {
  createJsonRenderer,
  serializeChart,
  type JsonRendererOptions,
} from './shell/renderer/json-renderer.js';

// CLI
export { parseArgs, DEFAULT_AREAS, USAGE, type CliCommand } from './shell/cli/parse-args.js';

// Types
export { PlotOptionsSchema } from './core/types.js';
export type {
  ChartData,
  ChartLine,
  ChartPoint,
  ChartPresentation,
  ChartTick,
  DataSource,
  PlotOptions,
  YScale,
} from './core/types.js';

// Errors
export type { ChartError } from './core/errors.js';
