export interface StudyModule {
  id: number;
  name: string;
  targetHours: number;
  examDate: string | null;
  createdAt: Date;
  /** Raw sum of the module's session durations at read time. */
  studiedHours: number;
}

export interface StudySession {
  id: number;
  moduleId: number;
  /** Name of the owning module, null when it no longer exists. */
  moduleName: string | null;
  duration: number;
  date: string;
  notes: string;
  createdAt: Date;
}

export interface Recommendation {
  id: number;
  text: string;
  createdAt: Date;
}

export interface NewModule {
  name: string;
  targetHours: number;
  examDate: string | null;
}

export interface NewSession {
  moduleId: number;
  duration: number;
  date: string;
  notes: string;
}

export interface DeletedModule {
  name: string;
  removedSessions: number;
}

// Wire shapes (snake_case, dates as YYYY-MM-DD, timestamps as ISO 8601)

export interface ModuleView {
  id: number;
  name: string;
  target_hours: number;
  exam_date: string | null;
  created_at: string;
  actual_hours: number;
  progress_percentage: number;
}

export interface ModuleDetailView extends ModuleView {
  sessions: SessionView[];
}

export interface SessionView {
  id: number;
  module_id: number;
  module_name: string | null;
  duration: number;
  date: string;
  notes: string;
  created_at: string;
}

export interface RecommendationView {
  id: number;
  recommendation_text: string;
  created_at: string;
}

export interface DashboardView {
  statistics: {
    hours_today: number;
    hours_week: number;
    hours_month: number;
    sessions_today: number;
    sessions_week: number;
    total_modules: number;
  };
  modules: ModuleView[];
  last_recommendation: RecommendationView | null;
}
