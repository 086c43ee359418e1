import { heatColor } from '../lib/colors';

interface HeatmapGridProps {
  rows: string[];
  columns: string[];
  values: (number | null)[][];
  domain: [number, number];
  palette: 'sequential' | 'diverging';
}

export function HeatmapGrid({ rows, columns, values, domain, palette }: HeatmapGridProps) {
  const digits = palette === 'diverging' ? 2 : 0;

  return (
    <div className="overflow-x-auto">
      <div
        className="inline-grid gap-[2px] text-[10px]"
        style={{ gridTemplateColumns: `minmax(120px, auto) repeat(${columns.length}, minmax(44px, 1fr))` }}
      >
        <div />
        {columns.map(column => (
          <div key={column} className="px-1 pb-1 font-bold text-slate-400 text-center truncate" title={column}>
            {column}
          </div>
        ))}
        {rows.map((row, r) => (
          <div key={row} className="contents">
            <div className="pr-2 font-bold text-slate-500 flex items-center justify-end truncate" title={row}>
              {row}
            </div>
            {columns.map((column, c) => {
              const value = values[r]?.[c] ?? null;
              const t = value === null ? 0 : (value - domain[0]) / (domain[1] - domain[0] || 1);
              return (
                <div
                  key={column}
                  className="h-9 rounded-md flex items-center justify-center font-mono hover:ring-2 hover:ring-emerald-400 transition-all"
                  style={{ backgroundColor: heatColor(value, domain, palette), color: t > 0.55 ? '#fff' : '#334155' }}
                  title={`${row} / ${column}: ${value === null ? 'n/a' : value.toFixed(digits)}`}
                >
                  {value === null ? '' : value.toFixed(digits)}
                </div>
              );
            })}
          </div>
        ))}
      </div>
      <div className="mt-4 flex items-center gap-2 text-[10px] text-slate-400 font-mono">
        <span>{domain[0].toFixed(digits)}</span>
        <div
          className="h-2 w-40 rounded-full"
          style={{
            background: `linear-gradient(to right, ${[0, 0.25, 0.5, 0.75, 1]
              .map(t => heatColor(domain[0] + t * (domain[1] - domain[0]), domain, palette))
              .join(', ')})`,
          }}
        />
        <span>{domain[1].toFixed(digits)}</span>
      </div>
    </div>
  );
}
