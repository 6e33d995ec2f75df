import { jsonEmbed } from './layout';

export type ChartType = 'line' | 'bar' | 'doughnut';

export interface ChartDataset {
  label: string;
  data: number[];
  color: string | string[];
}

export interface ChartSpec {
  type: ChartType;
  labels: string[];
  datasets: ChartDataset[];
  showLegend?: boolean;
}

/** Chart.js configuration for a spec. */
export function chartConfig(spec: ChartSpec): Record<string, unknown> {
  const datasets = spec.datasets.map((ds) => {
    const base = {
      label: ds.label,
      data: ds.data,
      backgroundColor: Array.isArray(ds.color) || spec.type !== 'line' ? ds.color : `${ds.color}33`,
      borderColor: ds.color,
      borderWidth: spec.type === 'doughnut' ? 0 : 2,
    };
    return spec.type === 'line' ? { ...base, fill: false, tension: 0.3, pointRadius: 2 } : base;
  });

  return {
    type: spec.type,
    data: { labels: spec.labels, datasets },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      plugins: {
        legend: { display: spec.showLegend ?? false, position: 'bottom' },
      },
      ...(spec.type === 'doughnut'
        ? { cutout: '60%' }
        : {
            scales: {
              x: { grid: { display: false }, ticks: { font: { size: 10 } } },
              y: { beginAtZero: true, ticks: { font: { size: 10 }, precision: 0 } },
            },
          }),
    },
  };
}

/** Bootstrap script for a canvas; a no-op when Chart.js failed to load. */
export function renderChartScript(canvasId: string, spec: ChartSpec): string {
  return `
  <script>
    (function() {
      var el = document.getElementById('${canvasId}');
      if (!el || typeof Chart === 'undefined') return;
      new Chart(el.getContext('2d'), ${jsonEmbed(chartConfig(spec))});
    })();
  </script>`;
}
