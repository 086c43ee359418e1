import type { ChartSpec } from '../types';
import { BoxPlotChart } from './BoxPlotChart';
import { CategoryAnalysis } from './CategoryAnalysis';
import { HeatmapGrid } from './HeatmapGrid';
import { HistogramChart } from './HistogramChart';
import { LineSeriesChart } from './LineSeriesChart';

interface ChartViewProps {
  spec: ChartSpec;
  onSelectCategory: (category: string) => void;
}

export function ChartView({ spec, onSelectCategory }: ChartViewProps) {
  switch (spec.kind) {
    case 'summary':
      return (
        <div className="space-y-6">
          {spec.paragraphs.map(p => (
            <p key={p} className="text-slate-600 leading-relaxed">{p}</p>
          ))}
          <div className="grid grid-cols-2 md:grid-cols-5 gap-4">
            {spec.facts.map(fact => (
              <div key={fact.label} className="p-4 rounded-2xl bg-slate-50 border border-slate-100">
                <p className="text-[10px] font-bold text-slate-400 uppercase tracking-wider">{fact.label}</p>
                <p className="text-xl font-black text-slate-800 mt-1">{fact.value}</p>
              </div>
            ))}
          </div>
        </div>
      );
    case 'box':
      return <BoxPlotChart series={spec.series} xLabel={spec.xLabel} />;
    case 'line':
      return <LineSeriesChart series={spec.series} xLabel={spec.xLabel} />;
    case 'heatmap':
      return <HeatmapGrid rows={spec.rows} columns={spec.columns} values={spec.values} domain={spec.domain} palette={spec.palette} />;
    case 'histogram':
      return <HistogramChart bins={spec.bins} series={spec.series} />;
    case 'category':
      return <CategoryAnalysis result={spec.result} categories={spec.categories} onSelect={onSelectCategory} />;
  }
}
