import * as echarts from 'echarts';
import type { EChartsOption } from 'echarts';
import type { PivotTable, ValueFormat } from '../../shared/types';
import { formatSnapshotTimestamp } from './snapshot';
import { scalePivotForDisplay } from './pivot';

export interface ChartSize {
  width: number;
  height: number;
}

const DEFAULT_CHART_SIZE: ChartSize = { width: 1200, height: 640 };

export function formatChartValue(value: number, format: ValueFormat): string {
  return format === 'integer' ? Math.trunc(value).toString() : value.toFixed(3);
}

export function buildPoolChartOption(table: PivotTable): EChartsOption {
  const display = scalePivotForDisplay(table);
  const { valueFormat, title } = display.display;

  const series = display.tags.map((tag, tagIndex) => ({
    name: tag,
    type: 'line' as const,
    showSymbol: true,
    symbol: 'circle',
    symbolSize: 4,
    connectNulls: false,
    data: display.rows.map((row) => [row.timestamp, row.values[tagIndex] ?? '-'])
  }));

  return {
    animation: false,
    title: {
      text: title,
      left: 'center'
    },
    tooltip: {
      trigger: 'axis',
      valueFormatter: (value: unknown) => {
        if (typeof value !== 'number' || Number.isNaN(value)) {
          return 'n/a';
        }
        return formatChartValue(value, valueFormat);
      }
    },
    legend: {
      top: 32
    },
    grid: {
      left: 84,
      right: 24,
      top: 72,
      bottom: 48
    },
    xAxis: {
      type: 'time',
      name: display.timeColumn,
      nameLocation: 'middle',
      nameGap: 30,
      axisLabel: {
        formatter: (value: number) => formatSnapshotTimestamp(value)
      }
    },
    yAxis: {
      type: 'value',
      name: title,
      nameLocation: 'middle',
      nameGap: 64,
      scale: true,
      axisLabel: {
        formatter: (value: number) => formatChartValue(value, valueFormat)
      }
    },
    series
  };
}

export function renderPoolChartSvg(table: PivotTable, size: ChartSize = DEFAULT_CHART_SIZE): string {
  const chart = echarts.init(null, null, {
    renderer: 'svg',
    ssr: true,
    width: size.width,
    height: size.height
  });
  try {
    chart.setOption(buildPoolChartOption(table));
    return chart.renderToSVGString();
  } finally {
    chart.dispose();
  }
}
