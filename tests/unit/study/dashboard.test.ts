/**
 * Dashboard aggregation over today / this week / this month
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { buildDashboard } from '../../../src/services/study/dashboard';
import { StudyStore } from '../../../src/services/study/studyStore';

describe('buildDashboard', () => {
  let store: StudyStore;
  let moduleId: number;

  beforeEach(async () => {
    store = new StudyStore();
    const module = await store.createModule({ name: 'Algorithms', targetHours: 20, examDate: '2026-12-01' });
    moduleId = module.id;
  });

  const log = (duration: number, date: string) =>
    store.createSession({ moduleId, duration, date, notes: '' });

  it('sums hours per inclusive window', async () => {
    // Thursday 2026-10-15, week started Monday 2026-10-12
    const now = new Date(2026, 9, 15, 14, 0);
    await log(2.0, '2026-10-15');
    await log(3.5, '2026-10-12');
    await log(1.25, '2026-10-05');
    await log(4, '2026-09-30');
    await log(1, '2026-10-16');

    const dashboard = await buildDashboard(store, now);

    expect(dashboard.statistics).toEqual({
      hours_today: 2,
      hours_week: 5.5,
      hours_month: 6.75,
      sessions_today: 1,
      sessions_week: 2,
      total_modules: 1
    });
  });

  it('counts the week across a month boundary', async () => {
    // Thursday 2026-10-01, week started Monday 2026-09-28
    const now = new Date(2026, 9, 1, 8, 0);
    await log(2, '2026-09-29');
    await log(1, '2026-10-01');

    const { statistics } = await buildDashboard(store, now);

    expect(statistics.hours_week).toBe(3);
    expect(statistics.hours_month).toBe(1);
    expect(statistics.sessions_week).toBe(2);
  });

  it('includes module progress and the latest recommendation', async () => {
    await log(5, '2026-10-10');
    await store.createRecommendation('old plan');
    await store.createRecommendation('new plan');

    const dashboard = await buildDashboard(store, new Date(2026, 9, 15));

    expect(dashboard.modules).toHaveLength(1);
    expect(dashboard.modules[0]).toMatchObject({ name: 'Algorithms', actual_hours: 5, progress_percentage: 25 });
    expect(dashboard.last_recommendation?.recommendation_text).toBe('new plan');
  });

  it('reports zeros and a null recommendation on an empty store', async () => {
    const dashboard = await buildDashboard(new StudyStore(), new Date(2026, 9, 15));

    expect(dashboard).toEqual({
      statistics: {
        hours_today: 0,
        hours_week: 0,
        hours_month: 0,
        sessions_today: 0,
        sessions_week: 0,
        total_modules: 0
      },
      modules: [],
      last_recommendation: null
    });
  });
});
