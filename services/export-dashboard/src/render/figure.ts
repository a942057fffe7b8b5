import type { FilterGroup, SeriesPlan } from '../domain/types.js';

// Plotly-compatible figure document. Only the attributes we emit are typed.
export type BarTrace = {
  type: 'bar';
  name: string;
  x: string[];
  y: number[];
  marker: { color: string };
  legendgroup: string;
  legendrank: number;
  customdata: string[];
  hovertemplate: string;
};

export type ScatterTrace = {
  type: 'scatter';
  name: string;
  x: string[];
  y: number[];
  mode: 'lines+markers';
  line: { color: string; width: number; dash: 'solid' };
  legendrank: number;
  hovertemplate: string;
};

export type UpdateMenuButton = {
  label: string;
  method: 'update';
  args: [{ visible: boolean[] }];
};

export type FigureLayout = {
  title: { text: string; x: number; y: number };
  barmode: 'stack';
  template: 'plotly_dark';
  paper_bgcolor: string;
  plot_bgcolor: string;
  margin: { t: number; l: number; r: number; b: number };
  legend: { x: number; y: number; xanchor: 'left'; yanchor: 'top' };
  updatemenus: Array<{
    buttons: UpdateMenuButton[];
    direction: 'down';
    showactive: boolean;
    x: number;
    xanchor: 'left';
    y: number;
    yanchor: 'top';
    bgcolor: string;
    font: { color: string };
  }>;
  xaxis: { automargin: boolean; type: 'category'; categoryorder: 'array'; categoryarray: string[] };
  yaxis: { automargin: boolean };
};

export type FigureDocument = {
  data: Array<BarTrace | ScatterTrace>;
  layout: FigureLayout;
};

export type FigureOptions = {
  title?: string;
};

export const DEFAULT_TITLE = 'Saskatchewan Ag Export Composition (Monthly)';

const BAR_HOVER = '<b>%{x}</b><br>Commodity: %{customdata}<br>Value: $%{y:,.0f}<extra></extra>';
const TREND_HOVER = '<b>%{x}</b><br>TOTAL: $%{y:,.0f}<extra></extra>';
const TRANSPARENT = 'rgba(0,0,0,0)';

function toButton(group: FilterGroup): UpdateMenuButton {
  return { label: group.label, method: 'update', args: [{ visible: group.visible }] };
}

export function buildFigure(plan: SeriesPlan, options: FigureOptions = {}): FigureDocument {
  const bars: BarTrace[] = plan.traces.map((trace) => ({
    type: 'bar',
    name: trace.name,
    x: trace.points.map((p) => p.period),
    y: trace.points.map((p) => p.value),
    marker: { color: trace.color },
    legendgroup: trace.category,
    legendrank: trace.legendRank,
    customdata: trace.points.map(() => trace.name),
    hovertemplate: BAR_HOVER,
  }));

  const trend: ScatterTrace = {
    type: 'scatter',
    name: plan.trend.name,
    x: plan.trend.points.map((p) => p.period),
    y: plan.trend.points.map((p) => p.value),
    mode: 'lines+markers',
    line: { color: 'white', width: 3, dash: 'solid' },
    legendrank: plan.trend.legendRank,
    hovertemplate: TREND_HOVER,
  };

  return {
    data: [...bars, trend],
    layout: {
      title: { text: options.title ?? DEFAULT_TITLE, x: 0.5, y: 0.95 },
      barmode: 'stack',
      template: 'plotly_dark',
      paper_bgcolor: TRANSPARENT,
      plot_bgcolor: TRANSPARENT,
      margin: { t: 120, l: 40, r: 40, b: 40 },
      legend: { x: 1.02, y: 1, xanchor: 'left', yanchor: 'top' },
      updatemenus: [
        {
          buttons: plan.filters.map(toButton),
          direction: 'down',
          showactive: true,
          x: 0,
          xanchor: 'left',
          y: 1.15,
          yanchor: 'top',
          bgcolor: TRANSPARENT,
          font: { color: 'white' },
        },
      ],
      xaxis: { automargin: true, type: 'category', categoryorder: 'array', categoryarray: plan.months },
      yaxis: { automargin: true },
    },
  };
}
