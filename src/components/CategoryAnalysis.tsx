import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { AqiCategory, CategoryResult } from '../types';
import { seriesColor } from '../lib/colors';
import { CATEGORY_ADVICE } from '../constants';

interface CategoryAnalysisProps {
  result: CategoryResult;
  categories: AqiCategory[];
  onSelect: (category: string) => void;
}

function rangeLabel(category: AqiCategory) {
  return category.upperBound === null ? `${category.lowerBound}+` : `${category.lowerBound}–${category.upperBound}`;
}

export function CategoryAnalysis({ result, categories, onSelect }: CategoryAnalysisProps) {
  const { category, observations, counts } = result;
  const chartData = counts.rows.map(row => {
    const entry: Record<string, string | number> = { location: row.location };
    counts.years.forEach((year, i) => {
      entry[String(year)] = row.counts[i];
    });
    return entry;
  });

  return (
    <div className="space-y-8">
      <div className="flex flex-col md:flex-row gap-4 md:items-center justify-between">
        <label className="flex items-center gap-3 text-sm font-medium text-slate-600">
          Select AQI Category
          <select
            value={category.name}
            onChange={e => onSelect(e.target.value)}
            className="px-4 py-2 rounded-xl border border-slate-200 bg-white focus:outline-none focus:ring-2 focus:ring-emerald-500/20 focus:border-emerald-500"
          >
            {categories.map(c => (
              <option key={c.name} value={c.name}>
                {c.name} ({rangeLabel(c)})
              </option>
            ))}
          </select>
        </label>
        <div className="flex items-center gap-2 text-xs text-slate-500">
          <div className="w-2.5 h-2.5 rounded-full" style={{ backgroundColor: category.color }} />
          {CATEGORY_ADVICE[category.name]}
        </div>
      </div>

      <section>
        <h3 className="text-lg font-bold text-slate-800 mb-4">Occurrences by Location and Year</h3>
        <div className="h-[420px] w-full">
          <ResponsiveContainer width="100%" height="100%">
            <BarChart data={chartData} margin={{ top: 10, right: 20, bottom: 60, left: 0 }}>
              <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#f1f5f9" />
              <XAxis dataKey="location" angle={-35} textAnchor="end" interval={0} tick={{ fontSize: 10, fill: '#64748b' }} />
              <YAxis allowDecimals={false} axisLine={false} tickLine={false} tick={{ fontSize: 10, fill: '#94a3b8' }} />
              <Tooltip contentStyle={{ borderRadius: '16px', border: 'none', boxShadow: '0 10px 15px -3px rgb(0 0 0 / 0.1)' }} />
              <Legend verticalAlign="top" />
              {counts.years.map((year, i) => (
                <Bar key={year} dataKey={String(year)} fill={seriesColor(i)} isAnimationActive={false} />
              ))}
            </BarChart>
          </ResponsiveContainer>
        </div>
      </section>

      <section>
        <h3 className="text-lg font-bold text-slate-800 mb-4">
          Locations, Months and Years in {category.name}
          <span className="ml-2 text-sm font-normal text-slate-400">{observations.length} readings</span>
        </h3>
        {observations.length === 0 ? (
          <p className="text-sm text-slate-400">No readings fall in this category.</p>
        ) : (
          <div className="max-h-96 overflow-y-auto rounded-2xl border border-slate-100">
            <table className="w-full text-sm">
              <thead className="bg-slate-50 text-[10px] uppercase tracking-wider text-slate-400 sticky top-0">
                <tr>
                  <th className="text-left px-4 py-2">Location</th>
                  <th className="text-left px-4 py-2">Month</th>
                  <th className="text-left px-4 py-2">Year</th>
                  <th className="text-right px-4 py-2">AQI</th>
                </tr>
              </thead>
              <tbody>
                {observations.map((obs, i) => (
                  <tr key={`${i}:${obs.location}`} className="border-t border-slate-100">
                    <td className="px-4 py-2 text-slate-700">{obs.location}</td>
                    <td className="px-4 py-2 text-slate-500">{obs.month}</td>
                    <td className="px-4 py-2 text-slate-500">{obs.year}</td>
                    <td className="px-4 py-2 text-right font-mono">{obs.aqi}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        )}
      </section>
    </div>
  );
}
