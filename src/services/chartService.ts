/**
 * Chart descriptions and their SVG rendering.
 *
 * A ChartSpec carries everything a chart needs. Each render call builds its
 * own ECharts instance in server-side mode and disposes of it afterwards,
 * so charts never share a canvas.
 */

import * as echarts from 'echarts';
import type {YearlySeries} from '../types/quake';

export type ChartKind = 'line' | 'bar';

export type ChartId = 'average-magnitude' | 'count-bar' | 'count-line';

export const CHART_IDS: readonly ChartId[] = ['average-magnitude', 'count-bar', 'count-line'];

export interface ChartSpec {
    id: ChartId;
    kind: ChartKind;
    title: string;
    xLabel: string;
    yLabel: string;
    series: YearlySeries;
}

export interface RenderOptions {
    width?: number;
    height?: number;
}

export const isChartId = (value: string): value is ChartId =>
    CHART_IDS.some(id => id === value);

export function averageMagnitudeChart(series: YearlySeries): ChartSpec {
    return {
        id: 'average-magnitude',
        kind: 'line',
        title: 'Average Magnitude per Year',
        xLabel: 'Year',
        yLabel: 'Average Magnitude',
        series
    };
}

export function countPerYearChart(series: YearlySeries, kind: ChartKind = 'bar'): ChartSpec {
    return {
        id: kind === 'bar' ? 'count-bar' : 'count-line',
        kind,
        title: 'Number of Earthquakes per Year',
        xLabel: 'Year',
        yLabel: 'Number',
        series
    };
}

export function buildChartOption(spec: ChartSpec): echarts.EChartsOption {
    const data = spec.series.values;
    return {
        animation: false,
        title: {text: spec.title, left: 'center'},
        grid: {left: 70, right: 30, top: 60, bottom: 80},
        xAxis: {
            type: 'category',
            name: spec.xLabel,
            nameLocation: 'middle',
            nameGap: 50,
            data: spec.series.years.map(String),
            axisLabel: {rotate: 45, interval: 0}
        },
        yAxis: {
            type: 'value',
            name: spec.yLabel,
            nameLocation: 'middle',
            nameGap: 50
        },
        series: [spec.kind === 'bar' ? {type: 'bar', data} : {type: 'line', data}]
    };
}

export function renderChartSvg(spec: ChartSpec, options: RenderOptions = {}): string {
    const chart = echarts.init(null, undefined, {
        renderer: 'svg',
        ssr: true,
        width: options.width ?? 800,
        height: options.height ?? 600
    });
    try {
        chart.setOption(buildChartOption(spec));
        return chart.renderToSVGString();
    } finally {
        chart.dispose();
    }
}
