import { useState, useEffect } from 'react';
import { Info, ShieldAlert } from 'lucide-react';
import { motion, AnimatePresence } from 'motion/react';
import type { ChartSpec, ViewId, ViewSummary } from './types';
import { apiService } from './api';
import Sidebar from './components/Sidebar';
import { ChartView } from './components/ChartView';

export default function App() {
  // ---- Application State ---------------------------------------------------

  /** Navigation entries fetched from /api/views on mount. */
  const [views, setViews] = useState<ViewSummary[]>([]);
  /** The view currently selected in the sidebar. */
  const [activeView, setActiveView] = useState<ViewId>('overview');
  /** Category chosen on the category analysis view; the server defaults to GOOD. */
  const [category, setCategory] = useState<string | undefined>(undefined);
  /** Chart specification for the active view. */
  const [spec, setSpec] = useState<ChartSpec | null>(null);
  const [error, setError] = useState<string | null>(null);

  // ---- Data Fetching -------------------------------------------------------

  useEffect(() => {
    const controller = new AbortController();
    apiService
      .getViews(controller.signal)
      .then(viewsData => {
        if (!Array.isArray(viewsData)) throw new Error('Views response is not an array');
        setViews(viewsData);
      })
      .catch(err => {
        if (err.name !== 'AbortError') setError(err.message);
      });
    return () => controller.abort();
  }, []);

  /** Refetch the chart whenever the view or category changes; cancels stale requests. */
  useEffect(() => {
    setSpec(null);
    setError(null);
    const controller = new AbortController();
    const selected = activeView === 'category-analysis' ? category : undefined;
    apiService
      .getView(activeView, selected, controller.signal)
      .then(setSpec)
      .catch(err => {
        if (err.name === 'AbortError') return;
        console.error(`Failed to fetch view ${activeView}:`, err);
        setError(err.message);
      });
    return () => controller.abort();
  }, [activeView, category]);

  const summary = views.find(v => v.id === activeView);

  // ---- Render ---------------------------------------------------------------

  return (
    <div className="min-h-screen bg-[#F8F9FA] text-slate-900 font-sans flex">
      <Sidebar views={views} activeView={activeView} onSelect={setActiveView} />

      <main className="flex-1 min-w-0 px-4 sm:px-6 lg:px-10 py-8">
        <AnimatePresence mode="wait">
          <motion.div
            key={activeView}
            initial={{ opacity: 0, y: 20 }}
            animate={{ opacity: 1, y: 0 }}
            exit={{ opacity: 0, y: -20 }}
            className="space-y-6"
          >
            <div>
              <h1 className="text-3xl md:text-4xl font-black text-slate-900 tracking-tight">{spec?.title ?? summary?.title}</h1>
            </div>

            <div className="bg-white rounded-2xl md:rounded-[2.5rem] p-6 md:p-10 shadow-sm border border-slate-100">
              {error ? (
                <div className="flex items-start gap-3 text-red-600">
                  <ShieldAlert className="w-5 h-5 shrink-0" />
                  <p className="text-sm">{error}</p>
                </div>
              ) : spec ? (
                <ChartView spec={spec} onSelectCategory={setCategory} />
              ) : (
                <p className="text-sm text-slate-400">Loading…</p>
              )}
            </div>

            {summary && (
              <div className="p-4 md:p-5 rounded-2xl bg-slate-900 text-white flex gap-3 md:gap-4">
                <Info className="w-4 h-4 md:w-5 md:h-5 text-emerald-400 shrink-0" />
                <p className="text-xs text-slate-300 leading-relaxed">
                  <strong className="text-emerald-400">How to use: </strong>
                  {summary.caption}
                </p>
              </div>
            )}
          </motion.div>
        </AnimatePresence>
      </main>
    </div>
  );
}
