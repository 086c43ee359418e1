import { Activity } from 'lucide-react';
import type { ViewId, ViewSummary } from '../types';
import { VIEW_ICONS } from '../constants';

interface SidebarProps {
  views: ViewSummary[];
  activeView: ViewId;
  onSelect: (view: ViewId) => void;
}

export default function Sidebar({ views, activeView, onSelect }: SidebarProps) {
  return (
    <aside className="w-64 shrink-0 bg-white border-r border-slate-200 min-h-screen sticky top-0 flex flex-col">
      <div className="p-6 border-b border-slate-100 flex items-center gap-2">
        <div className="bg-emerald-600 p-2 rounded-lg">
          <Activity className="text-white w-5 h-5" />
        </div>
        <div>
          <span className="text-lg font-bold tracking-tight text-slate-800">AQI Explorer</span>
          <p className="text-[10px] text-slate-400 uppercase tracking-wider">Navigation</p>
        </div>
      </div>

      <nav className="flex-1 py-4 px-3 space-y-1">
        {views.map(view => (
          <button
            key={view.id}
            onClick={() => onSelect(view.id)}
            className={`w-full flex items-center gap-3 px-4 py-2.5 rounded-xl text-sm font-medium transition-all ${activeView === view.id
              ? 'bg-emerald-50 text-emerald-700'
              : 'text-slate-500 hover:bg-slate-50'
              }`}
          >
            {VIEW_ICONS[view.id]}
            {view.title}
          </button>
        ))}
      </nav>
    </aside>
  );
}
