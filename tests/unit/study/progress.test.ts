/**
 * Derived module figures and wire serialization
 */

import { describe, it, expect } from 'vitest';
import {
  actualHours,
  progressPercentage,
  remainingHours,
  roundTo,
  sumHours,
  toModuleDetailView,
  toModuleView,
  toRecommendationView,
  toSessionView
} from '../../../src/services/study/progress';
import type { StudySession } from '../../../src/services/study/types';
import { makeModule } from '../../helpers';

const session: StudySession = {
  id: 7,
  moduleId: 1,
  moduleName: 'Algorithms',
  duration: 1.5,
  date: '2026-03-04',
  notes: 'graphs',
  createdAt: new Date('2026-03-04T18:00:00.000Z')
};

describe('progress figures', () => {
  it('rounds actual hours to two decimals', () => {
    expect(actualHours(makeModule({ studiedHours: 3.333 }))).toBe(3.33);
  });

  it('computes progress from the rounded actual hours', () => {
    expect(progressPercentage(makeModule({ targetHours: 10, studiedHours: 3.333 }))).toBe(33.3);
  });

  it('reports zero progress for a new module', () => {
    const module = makeModule({ targetHours: 25 });
    expect(actualHours(module)).toBe(0);
    expect(progressPercentage(module)).toBe(0);
  });

  it('reports zero progress when the target is zero', () => {
    expect(progressPercentage(makeModule({ targetHours: 0, studiedHours: 5 }))).toBe(0);
  });

  it('allows progress above 100 percent', () => {
    expect(progressPercentage(makeModule({ targetHours: 10, studiedHours: 12 }))).toBe(120);
  });

  it('never reports negative remaining hours', () => {
    expect(remainingHours(makeModule({ targetHours: 40, studiedHours: 12.5 }))).toBe(27.5);
    expect(remainingHours(makeModule({ targetHours: 10, studiedHours: 12 }))).toBe(0);
  });

  it('sums durations without float noise', () => {
    expect(sumHours([{ duration: 0.1 }, { duration: 0.2 }])).toBe(0.3);
    expect(sumHours([])).toBe(0);
  });

  it('rounds to the requested precision', () => {
    expect(roundTo(3.456, 1)).toBe(3.5);
    expect(roundTo(2.004, 2)).toBe(2);
  });
});

describe('views', () => {
  it('serializes a module with derived fields', () => {
    const view = toModuleView(makeModule({ targetHours: 20, studiedHours: 5, examDate: '2026-07-01' }));

    expect(view).toEqual({
      id: 1,
      name: 'Algorithms',
      target_hours: 20,
      exam_date: '2026-07-01',
      created_at: '2026-01-02T03:04:05.000Z',
      actual_hours: 5,
      progress_percentage: 25
    });
  });

  it('includes sessions in the detail view', () => {
    const view = toModuleDetailView(makeModule({ studiedHours: 1.5 }), [session]);

    expect(view.sessions).toEqual([
      {
        id: 7,
        module_id: 1,
        module_name: 'Algorithms',
        duration: 1.5,
        date: '2026-03-04',
        notes: 'graphs',
        created_at: '2026-03-04T18:00:00.000Z'
      }
    ]);
  });

  it('keeps a null module name when the module is gone', () => {
    expect(toSessionView({ ...session, moduleName: null }).module_name).toBeNull();
  });

  it('survives a JSON round trip unchanged', () => {
    const views = [
      toModuleView(makeModule({ studiedHours: 2.25, examDate: '2026-02-28' })),
      toSessionView(session),
      toRecommendationView({ id: 3, text: 'Day 1: rest', createdAt: new Date('2026-05-05T05:05:05.005Z') })
    ];

    for (const view of views) {
      expect(JSON.parse(JSON.stringify(view))).toEqual(view);
    }
  });
});
