import { dateWindows } from '../../utils/dates';
import { sumHours, toModuleView, toRecommendationView } from './progress';
import type { StudyStore } from './studyStore';
import type { DashboardView } from './types';

/**
 * Aggregate study time for today, the current week (from Monday) and the
 * current month, all windows ending today and inclusive on both ends.
 */
export async function buildDashboard(store: StudyStore, now: Date = new Date()): Promise<DashboardView> {
  const { today, weekStart, monthStart } = dateWindows(now);

  const [todaySessions, weekSessions, monthSessions, modules, lastRecommendation] = await Promise.all([
    store.listSessionsBetween(today, today),
    store.listSessionsBetween(weekStart, today),
    store.listSessionsBetween(monthStart, today),
    store.listModules(),
    store.latestRecommendation()
  ]);

  return {
    statistics: {
      hours_today: sumHours(todaySessions),
      hours_week: sumHours(weekSessions),
      hours_month: sumHours(monthSessions),
      sessions_today: todaySessions.length,
      sessions_week: weekSessions.length,
      total_modules: modules.length
    },
    modules: modules.map(toModuleView),
    last_recommendation: lastRecommendation ? toRecommendationView(lastRecommendation) : null
  };
}
