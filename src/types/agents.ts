import type { ValidationReport } from './validationReport';

export type AgentStatus = 'initialized' | 'ready' | 'error';

export type ActivityStatus = 'started' | 'completed' | 'completed_with_errors' | 'failed';

export interface ActivityRecord {
  agent_name: string;
  activity_type: string;
  status: ActivityStatus;
  timestamp: string;
  details: Record<string, unknown>;
  error_message: string | null;
}

export interface ActivityFilter {
  activityType?: string;
  status?: ActivityStatus;
}

export interface HandoffRecord<T> {
  from_agent: string;
  to_agent: string;
  timestamp: string;
  message: string;
  data: T;
}

export interface AgentStatusReport {
  agent_name: string;
  status: AgentStatus;
  total_activities: number;
  completed_activities: number;
  failed_activities: number;
  capabilities: string[];
}

// Validator agent

export interface ValidatorAgentOptions {
  minValueThreshold?: number;
  maxValueThreshold?: number;
  outputDir?: string;
  clock?: () => Date;
}

export interface ValidatorRunInput {
  inputFile: string;
  outputFile?: string;
  minValue?: number;
  maxValue?: number;
}

export interface ValidationRecord {
  input_file: string;
  timestamp: string;
  report_file: string;
  report: ValidationReport;
}

export type BatchValidationResult =
  | { file: string; status: 'success'; report: ValidationReport }
  | { file: string; status: 'error'; error: string };

export interface ValidationSummaryReport {
  total_validations: number;
  passed: number;
  failed: number;
  pass_rate: string;
  total_errors_found: number;
  total_warnings_found: number;
  files_validated: string[];
}

export interface ProcessFeedback {
  validation_status: ValidationReport['validation_status'];
  error_types_found: string[];
  warning_types_found: string[];
  recommendations: string[];
}

export interface AnomalyReport {
  errors: ValidationReport['errors'];
  warnings: ValidationReport['warnings'];
  suggested_fixes: string[];
}

// Process engineer agent

export type EdgeCaseSeverity = 'low' | 'medium' | 'high';

export interface ProcessStep {
  step: number;
  name: string;
  description?: string;
  [key: string]: unknown;
}

export interface ProcessDocument {
  process_name: string;
  category: string;
  description: string;
  steps: ProcessStep[];
  edge_cases: string[];
  automation_status: string;
  created_at: string;
  created_by: string;
  version: string;
}

export interface EdgeCase {
  id: number;
  scenario: string;
  process_affected: string;
  description: string;
  recommended_handling: string;
  severity: EdgeCaseSeverity;
  documented_at: string;
  status: 'documented';
}

export interface ChecklistItem {
  id: number;
  task: string;
  category: string;
  required: boolean;
  status: 'pending' | 'done';
  notes: string;
}

export interface ComplianceChecklist {
  title: string;
  building_id: string | null;
  created_at: string;
  deadline: string;
  items: ChecklistItem[];
}

export interface AutomationStatusEntry {
  status: string;
  automated_by: string | null;
  notes: string;
}

export interface AutomationRequest {
  process: string;
  current_status: string;
  priority: 'high' | 'medium';
  notes: string;
}

export interface ComplianceDocumentation {
  title: string;
  generated_at: string;
  regulation_year: number;
  overview: Record<string, string>;
  workflow: ProcessStep[];
  data_requirements: Record<string, unknown>;
  validation_rules: { rule: string; description: string; severity: string }[];
  edge_cases: EdgeCase[];
  common_errors: { error: string; cause: string; solution: string }[];
  automation_status: Record<string, AutomationStatusEntry>;
}

export interface ScriptsmithPackage {
  edge_cases: EdgeCase[];
  error_logs: Record<string, unknown>[];
  automation_requests: AutomationRequest[];
}

export interface ProcessEngineerOptions {
  regulationYear?: number;
  clock?: () => Date;
}

export interface DocumentProcessInput {
  processName: string;
  category: string;
  description: string;
  steps: ProcessStep[];
  edgeCases?: string[];
}

export interface EdgeCaseInput {
  scenario: string;
  processAffected: string;
  description: string;
  recommendedHandling: string;
  severity?: EdgeCaseSeverity;
}

export type ProcessEngineerAction =
  | { action: 'generate_documentation'; outputFile?: string }
  | ({ action: 'document_process' } & DocumentProcessInput)
  | ({ action: 'add_edge_case' } & EdgeCaseInput)
  | { action: 'create_checklist'; buildingId?: string; year?: number };

export type ProcessEngineerResult = ComplianceDocumentation | ProcessDocument | EdgeCase | ComplianceChecklist;

export interface CustomerIntake {
  building_id?: string;
  [key: string]: unknown;
}

export interface CustomerIntakeResult extends CustomerIntake {
  compliance_checklist?: ComplianceChecklist;
}
