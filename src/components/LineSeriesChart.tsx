import { CartesianGrid, Legend, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { LineSeries } from '../types';
import { seriesColor } from '../lib/colors';

type Row = Record<string, string | number | null>;

/** Merge series into one row per x value, sorted by x. */
export function toRows(series: LineSeries[]): Row[] {
  const rows = new Map<string | number, Row>();
  series.forEach((s, i) => {
    for (const point of s.points) {
      const row: Row = rows.get(point.x) ?? { x: point.x };
      row[`s${i}`] = point.y;
      rows.set(point.x, row);
    }
  });
  return [...rows.entries()]
    .sort(([a], [b]) => (typeof a === 'number' && typeof b === 'number' ? a - b : String(a).localeCompare(String(b))))
    .map(([, row]) => row);
}

export function LineSeriesChart({ series, xLabel }: { series: LineSeries[]; xLabel: string }) {
  const data = toRows(series);

  return (
    <div className="h-[480px] w-full">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data} margin={{ top: 10, right: 20, bottom: 30, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
          <XAxis dataKey="x" tick={{ fontSize: 10, fill: '#94a3b8' }} label={{ value: xLabel, position: 'insideBottom', offset: -20, fontSize: 12 }} />
          <YAxis axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} />
          <Tooltip
            formatter={value => (typeof value === 'number' ? value.toFixed(1) : value)}
            contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }}
          />
          {series.length > 1 && <Legend verticalAlign="top" />}
          {series.map((s, i) => (
            <Line
              key={s.name}
              type="monotone"
              dataKey={`s${i}`}
              name={s.name}
              stroke={seriesColor(i)}
              strokeWidth={2}
              dot={false}
              connectNulls={false}
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
