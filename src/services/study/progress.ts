import type {
  ModuleDetailView,
  ModuleView,
  Recommendation,
  RecommendationView,
  StudyModule,
  StudySession,
  SessionView
} from './types';

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function sumHours(sessions: Pick<StudySession, 'duration'>[]): number {
  return roundTo(
    sessions.reduce((total, session) => total + session.duration, 0),
    2
  );
}

export function actualHours(module: StudyModule): number {
  return roundTo(module.studiedHours, 2);
}

/** Zero when the module has no target, so there is no division by zero. */
export function progressPercentage(module: StudyModule): number {
  if (module.targetHours === 0) return 0;
  return roundTo((actualHours(module) / module.targetHours) * 100, 1);
}

export function remainingHours(module: StudyModule): number {
  return Math.max(0, roundTo(module.targetHours - actualHours(module), 2));
}

export function toModuleView(module: StudyModule): ModuleView {
  return {
    id: module.id,
    name: module.name,
    target_hours: module.targetHours,
    exam_date: module.examDate,
    created_at: module.createdAt.toISOString(),
    actual_hours: actualHours(module),
    progress_percentage: progressPercentage(module)
  };
}

export function toModuleDetailView(module: StudyModule, sessions: StudySession[]): ModuleDetailView {
  return { ...toModuleView(module), sessions: sessions.map(toSessionView) };
}

export function toSessionView(session: StudySession): SessionView {
  return {
    id: session.id,
    module_id: session.moduleId,
    module_name: session.moduleName,
    duration: session.duration,
    date: session.date,
    notes: session.notes,
    created_at: session.createdAt.toISOString()
  };
}

export function toRecommendationView(recommendation: Recommendation): RecommendationView {
  return {
    id: recommendation.id,
    recommendation_text: recommendation.text,
    created_at: recommendation.createdAt.toISOString()
  };
}
