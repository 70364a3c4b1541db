import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ValidationError } from '../../errors';
import type { HandoffRecord, ProcessEngineerAction, ProcessFeedback } from '../../types/agents';
import { ProcessEngineerAgent } from './ProcessEngineerAgent';

const FIXED_TIME = new Date(Date.UTC(2025, 3, 10, 8, 0, 0));
const clock = () => FIXED_TIME;

describe('ProcessEngineerAgent', () => {
  let agent: ProcessEngineerAgent;

  beforeEach(() => {
    agent = new ProcessEngineerAgent({ regulationYear: 2025, clock });
  });

  describe('checklists', () => {
    it('should create the ten-item checklist for a year', async () => {
      const checklist = await agent.run({ action: 'create_checklist', buildingId: 'BLD-1', year: 2026 });

      expect(checklist).toMatchObject({
        title: 'Benchmarking Compliance Checklist - 2026',
        building_id: 'BLD-1',
        created_at: FIXED_TIME.toISOString(),
        deadline: '2026-05-01',
      });
      if ('items' in checklist) {
        expect(checklist.items).toHaveLength(10);
        expect(checklist.items.every((item) => item.status === 'pending')).toBe(true);
        expect(checklist.items[7]).toEqual({
          id: 8,
          task: 'Submit to the building regulator',
          category: 'submission',
          required: true,
          status: 'pending',
          notes: 'Before May 1, 2026',
        });
      }
    });

    it('should default to the regulation year', () => {
      const checklist = agent.createComplianceChecklist();

      expect(checklist.deadline).toBe('2025-05-01');
      expect(checklist.building_id).toBeNull();
    });
  });

  describe('process documents', () => {
    it('should document a process in a known category', async () => {
      const doc = await agent.run({
        action: 'document_process',
        processName: 'Monthly intake',
        category: 'data_collection',
        description: 'Collect bills every month',
        steps: [{ step: 1, name: 'Download bills' }],
      });

      expect(doc).toEqual({
        process_name: 'Monthly intake',
        category: 'data_collection',
        description: 'Collect bills every month',
        steps: [{ step: 1, name: 'Download bills' }],
        edge_cases: [],
        automation_status: 'manual',
        created_at: FIXED_TIME.toISOString(),
        created_by: 'process_engineer',
        version: '1.0',
      });
      expect(agent.getProcessDocument('Monthly intake')).toEqual(doc);
    });

    it('should reject an unknown category and record the failure', async () => {
      await expect(
        agent.run({
          action: 'document_process',
          processName: 'Lunch',
          category: 'catering',
          description: 'Not a compliance process',
          steps: [],
        })
      ).rejects.toBeInstanceOf(ValidationError);

      expect(agent.getActivityLog({ status: 'failed' })[0].details).toEqual({ action: 'document_process' });
      expect(agent.getStatus().status).toBe('error');
    });

    it('should reject an unknown action', async () => {
      const action: ProcessEngineerAction = JSON.parse('{"action":"publish"}');

      await expect(agent.run(action)).rejects.toThrow('Unknown action');
    });
  });

  describe('edge cases and documentation', () => {
    it('should number edge cases and default their severity', () => {
      const first = agent.addEdgeCase({
        scenario: 'Meter swap',
        processAffected: 'data_collection',
        description: 'Two meters report for one month',
        recommendedHandling: 'Sum both readings',
      });
      const second = agent.addEdgeCase({
        scenario: 'Late bill',
        processAffected: 'submission',
        description: 'December bill arrives in March',
        recommendedHandling: 'Estimate and revise',
        severity: 'high',
      });

      expect(first).toMatchObject({ id: 1, severity: 'medium', status: 'documented' });
      expect(second).toMatchObject({ id: 2, severity: 'high' });
    });

    it('should generate documentation including recorded edge cases', async () => {
      agent.addEdgeCase({
        scenario: 'Meter swap',
        processAffected: 'data_collection',
        description: 'Two meters report for one month',
        recommendedHandling: 'Sum both readings',
      });

      const docs = await agent.generateFullDocumentation();

      expect(docs.title).toBe('Energy Benchmarking Compliance Process Documentation');
      expect(docs.regulation_year).toBe(2025);
      expect(docs.workflow).toHaveLength(6);
      expect(docs.validation_rules).toHaveLength(6);
      expect(docs.common_errors).toHaveLength(5);
      expect(docs.edge_cases.map((e) => e.scenario)).toEqual(['Meter swap']);
      expect(docs.automation_status.validation.status).toBe('automated');
    });

    describe('with an output file', () => {
      let tempDir: string;

      beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'process-engineer-'));
      });

      afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
      });

      it('should save the documentation', async () => {
        const outputFile = path.join(tempDir, 'docs.json');

        const docs = await agent.run({ action: 'generate_documentation', outputFile });

        expect(JSON.parse(fs.readFileSync(outputFile, 'utf-8'))).toEqual(docs);
      });
    });
  });

  describe('handoffs', () => {
    it('should request automation for manual and partial processes', () => {
      const handoff = agent.handoffToScriptsmith();

      expect(handoff.to_agent).toBe('scriptsmith');
      expect(handoff.data.automation_requests).toEqual([
        {
          process: 'data_collection',
          current_status: 'manual',
          priority: 'medium',
          notes: 'Requires utility provider integration',
        },
        {
          process: 'submission',
          current_status: 'manual',
          priority: 'high',
          notes: 'Requires benchmarking portal integration',
        },
        {
          process: 'compliance_check',
          current_status: 'partial',
          priority: 'medium',
          notes: 'Pre-submission checks automated',
        },
        {
          process: 'reporting',
          current_status: 'partial',
          priority: 'medium',
          notes: 'PDF generation pending',
        },
      ]);
    });

    it('should carry failed validator feedback into the next scriptsmith handoff', () => {
      const feedback: HandoffRecord<ProcessFeedback> = {
        from_agent: 'validator',
        to_agent: 'process_engineer',
        timestamp: FIXED_TIME.toISOString(),
        message: 'Validation feedback for process documentation update',
        data: {
          validation_status: 'FAIL',
          error_types_found: ['MissingMonths'],
          warning_types_found: [],
          recommendations: ['Implement monthly data collection reminders to prevent gaps'],
        },
      };

      agent.receiveFromValidator(feedback);

      expect(agent.handoffToScriptsmith().data.error_logs).toEqual([
        {
          received_at: FIXED_TIME.toISOString(),
          error_types: ['MissingMonths'],
          recommendations: ['Implement monthly data collection reminders to prevent gaps'],
        },
      ]);
    });

    it('should send process documents to the validator', () => {
      const doc = agent.documentProcess({
        processName: 'Review',
        category: 'validation',
        description: 'Check the export',
        steps: [],
      });

      expect(agent.handoffToValidator(doc)).toMatchObject({
        from_agent: 'process_engineer',
        to_agent: 'validator',
        message: 'Process documentation for compliance validation',
        data: doc,
      });
    });

    it('should attach a checklist to customers with a building id', () => {
      const intake = agent.receiveFromPilotHunter({
        from_agent: 'pilot_hunter',
        to_agent: 'process_engineer',
        timestamp: FIXED_TIME.toISOString(),
        message: 'New customer',
        data: { building_id: 'BLD-9', owner: 'Test Owner' },
      });

      expect(intake.owner).toBe('Test Owner');
      expect(intake.compliance_checklist?.building_id).toBe('BLD-9');
      expect(agent.getActivityLog({ activityType: 'receive_handoff' })[0].details).toEqual({
        from_agent: 'pilot_hunter',
        message: 'New customer',
      });
    });

    it('should leave customers without a building id unchanged', () => {
      const intake = agent.receiveFromPilotHunter({
        from_agent: 'pilot_hunter',
        to_agent: 'process_engineer',
        timestamp: FIXED_TIME.toISOString(),
        message: '',
        data: { owner: 'Test Owner' },
      });

      expect(intake).toEqual({ owner: 'Test Owner' });
    });
  });
});
