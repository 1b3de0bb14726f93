/**
 * Benchmark chart rendering
 *
 * Latency (left axis) and estimated tokens/s (right axis) against the run
 * index, as a Vega-Lite layered spec rendered headless to SVG by Vega and
 * rasterized to PNG by resvg. The rendering libraries are imported on
 * first use; a missing one surfaces as `RenderUnavailable`.
 */

import type { TopLevelSpec } from 'vega-lite';
import type { PlotPoint } from '../types/benchmark.js';
import { BenchError } from '../api/errors.js';

export interface ChartRequest {
  title: string;
  points: readonly PlotPoint[];
  width?: number;
  height?: number;
}

export interface ChartRenderer {
  /** PNG bytes */
  render(chart: ChartRequest): Promise<Buffer>;
}

export const CHART_WIDTH = 1280;
export const CHART_HEIGHT = 720;

const LATENCY_COLOR = '#1f77b4';
const THROUGHPUT_COLOR = '#ff7f0e';
const LATENCY_LABEL = 'Latency (s)';
const THROUGHPUT_LABEL = 'Estimated tokens/s';
const LEGEND_DOMAIN = [LATENCY_LABEL, THROUGHPUT_LABEL];
const LEGEND_RANGE = [LATENCY_COLOR, THROUGHPUT_COLOR];

export function buildChartSpec(chart: ChartRequest): TopLevelSpec {
  return {
    $schema: 'https://vega.github.io/schema/vega-lite/v5.json',
    title: chart.title,
    width: chart.width ?? CHART_WIDTH,
    height: chart.height ?? CHART_HEIGHT,
    autosize: { type: 'fit', contains: 'padding' },
    background: 'white',
    data: {
      values: chart.points.map((point) => ({
        run: point.run,
        latency: point.latencySeconds,
        tokensPerSecond: point.tokensPerSecond,
      })),
    },
    encoding: {
      x: { field: 'run', type: 'quantitative', title: 'Run', axis: { tickMinStep: 1 } },
    },
    layer: [
      {
        mark: { type: 'line', point: { shape: 'circle' } },
        encoding: {
          y: {
            field: 'latency',
            type: 'quantitative',
            title: 'Latency (seconds)',
            axis: { titleColor: LATENCY_COLOR },
          },
          color: {
            datum: LATENCY_LABEL,
            type: 'nominal',
            scale: { domain: LEGEND_DOMAIN, range: LEGEND_RANGE },
            legend: { title: null, orient: 'top-left' },
          },
        },
      },
      {
        mark: { type: 'line', point: { shape: 'square' } },
        encoding: {
          y: {
            field: 'tokensPerSecond',
            type: 'quantitative',
            title: 'Estimated tokens/second',
            axis: { titleColor: THROUGHPUT_COLOR, grid: false },
          },
          color: {
            datum: THROUGHPUT_LABEL,
            type: 'nominal',
            scale: { domain: LEGEND_DOMAIN, range: LEGEND_RANGE },
            legend: { title: null, orient: 'top-left' },
          },
        },
      },
    ],
    resolve: { scale: { y: 'independent' } },
    config: { axis: { gridOpacity: 0.3 } },
  };
}

class VegaChartRenderer implements ChartRenderer {
  constructor(
    private readonly vega: typeof import('vega'),
    private readonly vegaLite: typeof import('vega-lite'),
    private readonly resvg: typeof import('@resvg/resvg-js')
  ) {}

  async render(chart: ChartRequest): Promise<Buffer> {
    const { spec } = this.vegaLite.compile(buildChartSpec(chart));
    const view = new this.vega.View(this.vega.parse(spec), { renderer: 'none' });
    try {
      const svg = await view.toSVG();
      return new this.resvg.Resvg(svg, { background: 'white' }).render().asPng();
    } finally {
      view.finalize();
    }
  }
}

/**
 * Import the rendering stack.
 *
 * @throws BenchError `RenderUnavailable` when any of it cannot be loaded
 */
export async function loadChartRenderer(): Promise<ChartRenderer> {
  try {
    const [vega, vegaLite, resvg] = await Promise.all([
      import('vega'),
      import('vega-lite'),
      import('@resvg/resvg-js'),
    ]);
    return new VegaChartRenderer(vega, vegaLite, resvg);
  } catch (error) {
    throw new BenchError(
      'RenderUnavailable',
      `Chart rendering libraries could not be loaded: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
