import { actualHours, remainingHours } from '../study/progress';
import type { StudyModule } from '../study/types';

const PLAN_INSTRUCTIONS = `
You are an intelligent study plan generator.
Based on the modules above, create a detailed, realistic study plan for the next 2 weeks.

**Goal:**
Spread the preparation for the upcoming exams as well as possible.
For every day, state:
- the date
- the modules to study
- the recommended study time in hours per module
- optionally short learning goals or focus topics

**Output requirements:**
- Period: the next 14 days (starting today)
- Clear table or list format
- Distribute study time realistically (no 10-hour stretches)
- Plan rest days or shorter sessions on weekends

**Answer format:**
Day (date):
- Module: X hours – topic/focus: ...
`;

export function describeModule(module: StudyModule): string {
  const exam = module.examDate ? ` (exam on ${module.examDate})` : '';
  return (
    `- ${module.name}: target ${module.targetHours}h, already studied ${actualHours(module)}h, ` +
    `${remainingHours(module)}h remaining${exam}`
  );
}

export function buildStudyPlanPrompt(modules: StudyModule[]): string {
  const lines = modules.map(describeModule).join('\n');
  return `I am studying for the following modules:\n\n${lines}\n${PLAN_INSTRUCTIONS}`;
}
