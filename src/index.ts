// Core exports
export { ComplexityAnalyzer, analyzeComplexity, analyzeMessageComplexity, estimateGenerationTime, estimateFileCount } from './core/ComplexityAnalyzer';
export type { ComplexityAnalysis } from './core/ComplexityAnalyzer';
export { ModelSelector, parseModelString, pickPreferredModel, CLOUD_MODELS } from './core/ModelSelector';
export type { ModelLister } from './core/ModelSelector';
export { ProjectGenerator } from './core/ProjectGenerator';
export type { GenerateProjectOptions, GenerationResult } from './core/ProjectGenerator';
export { ErrorCorrector, validationCommand } from './core/ErrorCorrector';
export type { ErrorAnalysis, FixResult, FixAttempt, RunAndFixResult } from './core/ErrorCorrector';
export { TryErrorBuilder, evaluateRun, formatIntrospection } from './core/TryErrorBuilder';
export type { StepFixer, TryErrorBuilderOptions } from './core/TryErrorBuilder';
export { BuildPlan } from './core/Plan';
export type { BuildStep, StepStatus, PlanSummary } from './core/Plan';
export { generateBuildSteps, generateProjectPlan, FALLBACK_STEPS } from './core/PlanGenerator';
export { BackupStore, createTimestampedBackup } from './core/BackupStore';
export { StateStore } from './core/StateStore';
export { NegativeMemory } from './core/NegativeMemory';

// Configuration and models
export { ConfigStore, CONFIG_KEYS } from './config/store';
export { ModelClient } from './services/llm/model-client';
export type { TextGenerator, GenerateOptions } from './services/llm/model-client';
export { chatCompletion, calculateCost } from './services/llm';
export { runCommand } from './services/process-runner';
export type { CommandResult, CommandRunner } from './services/process-runner';

// Type exports
export { BuildStopReason } from './types/build';
export type { BuildOptions, BuildResult, BuildState, FileChange, FailedPatch } from './types/build';
export type { ModelInfo, Provider, ProviderMode, Complexity } from './types/model';

// Utilities
export { createUnifiedDiff, applyUnifiedDiff, similarity } from './utils/diff';
export { extractCode, extractJson, parseFileChanges } from './utils/code-extraction';
export { isDangerousCommand } from './utils/command-safety';
export * from './utils/error-utils';

export { createProgram } from './cli/program';
export { VERSION } from './version';
