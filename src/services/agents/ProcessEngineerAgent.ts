import { config } from '../../config/env';
import reference from '../../data/complianceReference.json';
import { ValidationError, errorMessage } from '../../errors';
import type {
  AutomationRequest,
  AutomationStatusEntry,
  ChecklistItem,
  ComplianceChecklist,
  ComplianceDocumentation,
  CustomerIntake,
  CustomerIntakeResult,
  DocumentProcessInput,
  EdgeCase,
  EdgeCaseInput,
  HandoffRecord,
  ProcessDocument,
  ProcessEngineerAction,
  ProcessEngineerOptions,
  ProcessEngineerResult,
  ProcessFeedback,
  ProcessStep,
  ScriptsmithPackage,
} from '../../types/agents';
import { BaseAgent } from './BaseAgent';

const PROCESS_CATEGORIES: readonly string[] = reference.processCategories;
const WORKFLOW: ProcessStep[] = reference.workflow;
const AUTOMATION_STATUS: Record<string, AutomationStatusEntry> = reference.automationStatus;

/**
 * Maintains the benchmarking compliance process documentation: the
 * workflow, recorded edge cases and submission checklists.
 */
export class ProcessEngineerAgent extends BaseAgent<ProcessEngineerAction, ProcessEngineerResult> {
  private readonly regulationYear: number;
  private readonly processDocs = new Map<string, ProcessDocument>();
  private readonly edgeCases: EdgeCase[] = [];
  private readonly errorLogs: Record<string, unknown>[] = [];

  constructor(options: ProcessEngineerOptions = {}) {
    super('process_engineer', options.clock);
    this.regulationYear = options.regulationYear ?? config.compliance.regulationYear;
  }

  getCapabilities(): string[] {
    return [
      'document_process',
      'track_edge_cases',
      'generate_workflow_diagram',
      'create_checklist',
      'monitor_regulations',
      'handoff_to_validator',
      'handoff_to_scriptsmith',
      'receive_from_pilot_hunter',
    ];
  }

  async run(input: ProcessEngineerAction): Promise<ProcessEngineerResult> {
    this.logActivity('process_engineering', 'started', { action: input.action });

    try {
      const result = await this.dispatch(input);

      this.logActivity('process_engineering', 'completed', {
        action: input.action,
        result_keys: Object.keys(result),
      });
      this.status = 'ready';
      return result;
    } catch (error) {
      this.logActivity('process_engineering', 'failed', { action: input.action }, errorMessage(error));
      this.status = 'error';
      throw error;
    }
  }

  private async dispatch(input: ProcessEngineerAction): Promise<ProcessEngineerResult> {
    switch (input.action) {
      case 'generate_documentation':
        return this.generateFullDocumentation(input.outputFile);
      case 'document_process':
        return this.documentProcess(input);
      case 'add_edge_case':
        return this.addEdgeCase(input);
      case 'create_checklist':
        return this.createComplianceChecklist(input.buildingId, input.year);
      default: {
        const unsupported: never = input;
        throw new ValidationError('Unknown action', { input: unsupported });
      }
    }
  }

  async generateFullDocumentation(outputFile?: string): Promise<ComplianceDocumentation> {
    const documentation: ComplianceDocumentation = {
      title: 'Energy Benchmarking Compliance Process Documentation',
      generated_at: this.now(),
      regulation_year: this.regulationYear,
      overview: reference.overview,
      workflow: WORKFLOW,
      data_requirements: reference.dataRequirements,
      validation_rules: reference.validationRules,
      edge_cases: [...this.edgeCases],
      common_errors: reference.commonErrors,
      automation_status: AUTOMATION_STATUS,
    };

    if (outputFile) {
      await this.saveReport(documentation, outputFile);
    }

    return documentation;
  }

  documentProcess(input: DocumentProcessInput): ProcessDocument {
    if (!PROCESS_CATEGORIES.includes(input.category)) {
      throw new ValidationError(`Invalid category. Must be one of: ${PROCESS_CATEGORIES.join(', ')}`, {
        category: input.category,
      });
    }

    const processDoc: ProcessDocument = {
      process_name: input.processName,
      category: input.category,
      description: input.description,
      steps: input.steps,
      edge_cases: input.edgeCases ?? [],
      automation_status: 'manual',
      created_at: this.now(),
      created_by: this.name,
      version: '1.0',
    };

    this.processDocs.set(input.processName, processDoc);
    this.log.info(`Documented process: ${input.processName}`);
    return processDoc;
  }

  getProcessDocument(processName: string): ProcessDocument | undefined {
    return this.processDocs.get(processName);
  }

  addEdgeCase(input: EdgeCaseInput): EdgeCase {
    const edgeCase: EdgeCase = {
      id: this.edgeCases.length + 1,
      scenario: input.scenario,
      process_affected: input.processAffected,
      description: input.description,
      recommended_handling: input.recommendedHandling,
      severity: input.severity ?? 'medium',
      documented_at: this.now(),
      status: 'documented',
    };

    this.edgeCases.push(edgeCase);
    this.log.info(`Added edge case: ${input.scenario}`);
    return edgeCase;
  }

  createComplianceChecklist(buildingId?: string, year?: number): ComplianceChecklist {
    const checklistYear = year ?? this.regulationYear;

    const items: ChecklistItem[] = reference.checklistItems.map((item): ChecklistItem => ({
      id: item.id,
      task: item.task,
      category: item.category,
      required: item.required,
      status: 'pending',
      notes: item.notes.replace('{year}', String(checklistYear)),
    }));

    this.log.info(`Created compliance checklist for ${checklistYear}`);

    return {
      title: `Benchmarking Compliance Checklist - ${checklistYear}`,
      building_id: buildingId ?? null,
      created_at: this.now(),
      deadline: `${checklistYear}-05-01`,
      items,
    };
  }

  handoffToValidator(processDoc: ProcessDocument): HandoffRecord<ProcessDocument> {
    return this.handoff('validator', processDoc, 'Process documentation for compliance validation');
  }

  handoffToScriptsmith(edgeCases?: EdgeCase[], errorLogs?: Record<string, unknown>[]): HandoffRecord<ScriptsmithPackage> {
    const data: ScriptsmithPackage = {
      edge_cases: edgeCases ?? [...this.edgeCases],
      error_logs: errorLogs ?? [...this.errorLogs],
      automation_requests: ProcessEngineerAgent.automationRequests(),
    };

    return this.handoff('scriptsmith', data, 'Edge cases and error logs for automation development');
  }

  /**
   * Keeps validator feedback from failed runs as error logs for the next
   * scriptsmith handoff
   */
  receiveFromValidator(handoff: HandoffRecord<ProcessFeedback>): ProcessFeedback {
    const feedback = this.receiveHandoff(handoff);

    if (feedback.validation_status === 'FAIL') {
      this.errorLogs.push({
        received_at: this.now(),
        error_types: feedback.error_types_found,
        recommendations: feedback.recommendations,
      });
    }

    return feedback;
  }

  receiveFromPilotHunter(handoff: HandoffRecord<CustomerIntake>): CustomerIntakeResult {
    const customer: CustomerIntakeResult = { ...this.receiveHandoff(handoff) };

    if (customer.building_id) {
      customer.compliance_checklist = this.createComplianceChecklist(customer.building_id);
    }

    this.log.info('Received customer data from Pilot Hunter');
    return customer;
  }

  private static automationRequests(): AutomationRequest[] {
    return Object.entries(AUTOMATION_STATUS)
      .filter(([, info]) => info.status === 'manual' || info.status === 'partial')
      .map(([process, info]): AutomationRequest => ({
        process,
        current_status: info.status,
        priority: process === 'submission' ? 'high' : 'medium',
        notes: info.notes,
      }));
  }
}
