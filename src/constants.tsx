import type { ReactNode } from 'react';
import {
  Activity,
  BarChart3,
  CalendarDays,
  Flame,
  Grid3x3,
  Info,
  Layers,
  MapPin,
  ShieldAlert,
  Sun,
  TrendingUp,
} from 'lucide-react';
import type { CategoryName, ViewId } from './types';

export const VIEW_ICONS: Record<ViewId, ReactNode> = {
  overview: <Info className="w-4 h-4" />,
  'annual-trends': <Layers className="w-4 h-4" />,
  'seasonal-patterns': <Sun className="w-4 h-4" />,
  'monthly-variations': <Activity className="w-4 h-4" />,
  'location-comparison': <MapPin className="w-4 h-4" />,
  'pollution-hotspots': <Flame className="w-4 h-4" />,
  'time-series': <TrendingUp className="w-4 h-4" />,
  correlation: <Grid3x3 className="w-4 h-4" />,
  distribution: <BarChart3 className="w-4 h-4" />,
  'yearly-trend': <CalendarDays className="w-4 h-4" />,
  'category-analysis': <ShieldAlert className="w-4 h-4" />,
};

/** Health guidance shown next to the selected AQI category. */
export const CATEGORY_ADVICE: Record<CategoryName, string> = {
  GOOD: 'Minimal impact.',
  SATISFACTORY: 'Minor breathing discomfort to sensitive people.',
  MODERATE: 'Breathing discomfort to people with lung or heart disease, children and older adults.',
  POOR: 'Breathing discomfort to most people on prolonged exposure.',
  'VERY POOR': 'Respiratory illness on prolonged exposure.',
  SEVERE: 'Affects healthy people and seriously impacts those with existing diseases.',
};
