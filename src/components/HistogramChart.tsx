import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { HistogramBin } from '../types';
import { seriesColor } from '../lib/colors';

interface HistogramChartProps {
  bins: HistogramBin[];
  series: { name: string; counts: number[] }[];
}

export function HistogramChart({ bins, series }: HistogramChartProps) {
  const data = bins.map((bin, b) => {
    const row: Record<string, string | number> = { bin: `${bin.start}–${bin.end}` };
    series.forEach((s, i) => {
      row[`s${i}`] = s.counts[b] ?? 0;
    });
    return row;
  });

  return (
    <div className="h-[480px] w-full">
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} barCategoryGap={1} margin={{ top: 10, right: 20, bottom: 30, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
          <XAxis dataKey="bin" tick={{ fontSize: 10, fill: '#94a3b8' }} label={{ value: 'AQI', position: 'insideBottom', offset: -20, fontSize: 12 }} />
          <YAxis allowDecimals={false} axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} />
          <Tooltip contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }} />
          <Legend verticalAlign="top" />
          {series.map((s, i) => (
            <Bar key={s.name} dataKey={`s${i}`} name={s.name} stackId="count" fill={seriesColor(i)} isAnimationActive={false} />
          ))}
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
