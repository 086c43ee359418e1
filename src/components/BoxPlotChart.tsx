import type { ReactElement } from 'react';
import { Bar, CartesianGrid, ComposedChart, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { BoxSeries, BoxStats } from '../types';
import { seriesColor } from '../lib/colors';

interface BoxDatum {
  x: string;
  stats: Record<string, BoxStats>;
}

interface BoxShapeProps {
  x: number;
  y: number;
  width: number;
  height: number;
  payload: BoxDatum;
}

function isBoxShapeProps(props: unknown): props is BoxShapeProps {
  return (
    typeof props === 'object' &&
    props !== null &&
    'x' in props && typeof props.x === 'number' &&
    'y' in props && typeof props.y === 'number' &&
    'width' in props && typeof props.width === 'number' &&
    'height' in props && typeof props.height === 'number' &&
    'payload' in props && typeof props.payload === 'object' && props.payload !== null
  );
}

/**
 * The bar spans [min, max]; everything else is placed on the same linear
 * scale recovered from the bar's pixel extent.
 */
function renderBox(series: string, color: string) {
  return (props: unknown): ReactElement => {
    if (!isBoxShapeProps(props)) return <g />;
    const stats = props.payload.stats[series];
    if (!stats) return <g />;
    const { x, y, width, height } = props;
    const span = stats.max - stats.min;
    const py = (v: number) => (span === 0 ? y : y + ((stats.max - v) / span) * height);
    const cx = x + width / 2;
    const boxWidth = Math.max(width * 0.7, 4);
    const left = cx - boxWidth / 2;

    return (
      <g>
        <line x1={cx} x2={cx} y1={py(stats.upperWhisker)} y2={py(stats.q3)} stroke={color} />
        <line x1={cx} x2={cx} y1={py(stats.q1)} y2={py(stats.lowerWhisker)} stroke={color} />
        <line x1={cx - boxWidth / 4} x2={cx + boxWidth / 4} y1={py(stats.upperWhisker)} y2={py(stats.upperWhisker)} stroke={color} />
        <line x1={cx - boxWidth / 4} x2={cx + boxWidth / 4} y1={py(stats.lowerWhisker)} y2={py(stats.lowerWhisker)} stroke={color} />
        <rect
          x={left}
          y={py(stats.q3)}
          width={boxWidth}
          height={Math.max(py(stats.q1) - py(stats.q3), 1)}
          fill={color}
          fillOpacity={0.25}
          stroke={color}
        />
        <line x1={left} x2={left + boxWidth} y1={py(stats.median)} y2={py(stats.median)} stroke={color} strokeWidth={2} />
        {stats.outliers.map((v, i) => (
          <circle key={i} cx={cx} cy={py(v)} r={2.5} fill={color} />
        ))}
      </g>
    );
  };
}

export function BoxPlotChart({ series, xLabel }: { series: BoxSeries[]; xLabel: string }) {
  const byX = new Map<string, BoxDatum>();
  for (const s of series) {
    for (const box of s.boxes) {
      const datum = byX.get(box.x) ?? { x: box.x, stats: {} };
      datum.stats[s.name] = box.stats;
      byX.set(box.x, datum);
    }
  }
  const data = [...byX.values()];
  const top = Math.max(0, ...series.flatMap(s => s.boxes.map(b => b.stats.max)));

  return (
    <div className="h-[480px] w-full">
      <ResponsiveContainer width="100%" height="100%">
        <ComposedChart data={data} margin={{ top: 10, right: 20, bottom: 40, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
          <XAxis dataKey="x" angle={data.length > 8 ? -35 : 0} textAnchor={data.length > 8 ? 'end' : 'middle'} tick={{ fontSize: 11, fill: '#64748b' }} label={{ value: xLabel, position: 'insideBottom', offset: -30, fontSize: 12 }} />
          <YAxis domain={[0, Math.ceil(top * 1.05)]} axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} />
          <Tooltip
            formatter={(_value, name, item) => {
              const stats = typeof name === 'string' && isBoxDatum(item.payload) ? item.payload.stats[name] : undefined;
              return stats ? `median ${stats.median.toFixed(1)} (IQR ${stats.q1.toFixed(1)}–${stats.q3.toFixed(1)}, n=${stats.count})` : '';
            }}
            contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }}
          />
          {series.length > 1 && <Legend verticalAlign="top" />}
          {series.map((s, i) => (
            <Bar
              key={s.name}
              name={s.name}
              dataKey={(d: BoxDatum) => {
                const stats = d.stats[s.name];
                return stats ? [stats.min, stats.max] : undefined;
              }}
              fill={seriesColor(i)}
              isAnimationActive={false}
              shape={renderBox(s.name, seriesColor(i))}
            />
          ))}
        </ComposedChart>
      </ResponsiveContainer>
    </div>
  );
}

function isBoxDatum(value: unknown): value is BoxDatum {
  return typeof value === 'object' && value !== null && 'stats' in value && typeof value.stats === 'object' && value.stats !== null;
}
