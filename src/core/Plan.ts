import { STEP_STATUS } from '../config/constants';

export type StepStatus = typeof STEP_STATUS[keyof typeof STEP_STATUS];

export interface BuildStep {
  id: string;
  index: number;
  description: string;
  status: StepStatus;
  attempts: number;
  error?: string;
}

export interface PlanSummary {
  total: number;
  completed: number;
  failed: number;
  skipped: number;
  pending: number;
}

/**
 * Ordered build steps for one project and their progress
 */
export class BuildPlan {
  id: string;
  description: string;
  technologies: string[];
  steps: BuildStep[];
  createdAt: Date;
  updatedAt: Date;

  constructor(id: string, description: string, technologies: string[] = [], stepDescriptions: string[] = []) {
    this.id = id;
    this.description = description;
    this.technologies = technologies;
    this.steps = [];
    this.createdAt = new Date();
    this.updatedAt = new Date();

    for (const step of stepDescriptions) {
      this.addStep(step);
    }
  }

  addStep(description: string): BuildStep {
    const step: BuildStep = {
      id: `${this.id.substring(0, 8)}-s${this.steps.length + 1}`,
      index: this.steps.length,
      description,
      status: STEP_STATUS.PENDING,
      attempts: 0
    };

    this.steps.push(step);
    this.updatedAt = new Date();
    return step;
  }

  getStep(index: number): BuildStep | undefined {
    return this.steps[index];
  }

  updateStep(stepId: string, updates: Partial<Omit<BuildStep, 'id' | 'index'>>): void {
    const step = this.steps.find(candidate => candidate.id === stepId);

    if (step) {
      Object.assign(step, updates);
      this.updatedAt = new Date();
    }
  }

  // Mark steps finished in an earlier run
  markCompleted(indexes: number[]): void {
    for (const index of indexes) {
      const step = this.steps[index];
      if (step) {
        this.updateStep(step.id, { status: STEP_STATUS.COMPLETED });
      }
    }
  }

  get descriptions(): string[] {
    return this.steps.map(step => step.description);
  }

  summary(): PlanSummary {
    const count = (status: StepStatus): number => this.steps.filter(step => step.status === status).length;
    return {
      total: this.steps.length,
      completed: count(STEP_STATUS.COMPLETED),
      failed: count(STEP_STATUS.FAILED),
      skipped: count(STEP_STATUS.SKIPPED),
      pending: count(STEP_STATUS.PENDING)
    };
  }
}
