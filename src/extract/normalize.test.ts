/**
 * Flow normalization tests
 */

import { describe, it, expect } from 'vitest';
import { normalizeFlow, RecoveredStepSchema } from './normalize.js';

describe('normalizeFlow', () => {
  it('should map a complete recovered object', () => {
    const raw = {
      process_name: 'Vendor onboarding',
      process_description: 'Adds a new vendor to the payment system',
      steps: [
        {
          step_number: 1,
          step_name: 'Collect forms',
          description: 'Request W-9 and banking details',
          responsible_role: 'Procurement Analyst',
          inputs: ['Vendor request'],
          outputs: ['W-9', 'Bank letter'],
          decision_points: ['Forms complete?'],
          next_steps: [2],
        },
        {
          step_number: 2,
          step_name: 'Create vendor record',
          description: 'Enter vendor in ERP',
          responsible_role: 'AP Clerk',
          inputs: ['W-9'],
          outputs: ['Vendor ID'],
          decision_points: [],
          next_steps: [],
        },
      ],
      roles: ['Procurement Analyst', 'AP Clerk'],
      tools_systems: ['ERP'],
      compliance_requirements: ['SOX 404'],
    };

    const flow = normalizeFlow(raw, 'vendor.docx', '/sops/vendor.docx', 'vendor.docx', 'gpt-4o-mini');

    expect(flow.processName).toBe('Vendor onboarding');
    expect(flow.processDescription).toBe('Adds a new vendor to the payment system');
    expect(flow.steps).toHaveLength(2);
    expect(flow.steps[0]).toEqual({
      stepNumber: 1,
      stepName: 'Collect forms',
      description: 'Request W-9 and banking details',
      responsibleRole: 'Procurement Analyst',
      inputs: ['Vendor request'],
      outputs: ['W-9', 'Bank letter'],
      decisionPoints: ['Forms complete?'],
      nextSteps: [2],
    });
    expect(flow.roles).toEqual(['Procurement Analyst', 'AP Clerk']);
    expect(flow.toolsSystems).toEqual(['ERP']);
    expect(flow.complianceRequirements).toEqual(['SOX 404']);
    expect(flow.rawData).toBe(raw);
  });

  it('should not fail on a mapping with no fields', () => {
    const flow = normalizeFlow({}, 'empty.txt', '/docs/empty.txt', 'empty.txt', 'llama3');

    expect(flow.processName).toBe('');
    expect(flow.processDescription).toBe('');
    expect(flow.steps).toEqual([]);
    expect(flow.roles).toEqual([]);
    expect(flow.toolsSystems).toEqual([]);
    expect(flow.complianceRequirements).toEqual([]);
  });

  it('should take document identity from the arguments, not the model', () => {
    const flow = normalizeFlow(
      {
        process_name: 'P',
        source_document: 'spoofed.pdf',
        extraction_model: 'spoofed-model',
        document_path: '/etc/passwd',
      },
      'real.pdf',
      '/sops/team/real.pdf',
      'team/real.pdf',
      'claude-test'
    );

    expect(flow.sourceDocument).toBe('real.pdf');
    expect(flow.documentPath).toBe('/sops/team/real.pdf');
    expect(flow.documentRelativePath).toBe('team/real.pdf');
    expect(flow.extractionModel).toBe('claude-test');
  });

  it('should degrade malformed fields to defaults', () => {
    const flow = normalizeFlow(
      {
        process_name: 42,
        process_description: null,
        steps: 'not a list',
        roles: 'Manager',
        tools_systems: ['Excel', 7, null, 'SAP'],
        compliance_requirements: { a: 1 },
      },
      'd',
      'p',
      'r',
      'm'
    );

    expect(flow.processName).toBe('');
    expect(flow.processDescription).toBe('');
    expect(flow.steps).toEqual([]);
    expect(flow.roles).toEqual([]);
    expect(flow.toolsSystems).toEqual(['Excel', 'SAP']);
    expect(flow.complianceRequirements).toEqual([]);
  });

  it('should drop non-object steps and default missing step fields', () => {
    const flow = normalizeFlow(
      { steps: ['loose text', { step_name: 'Only a name' }, null] },
      'd',
      'p',
      'r',
      'm'
    );

    expect(flow.steps).toEqual([
      {
        stepNumber: 0,
        stepName: 'Only a name',
        description: '',
        responsibleRole: '',
        inputs: [],
        outputs: [],
        decisionPoints: [],
        nextSteps: [],
      },
    ]);
  });

  it('should keep step order as extracted', () => {
    const flow = normalizeFlow(
      { steps: [{ step_number: 3 }, { step_number: 1 }, { step_number: 2 }] },
      'd',
      'p',
      'r',
      'm'
    );

    expect(flow.steps.map((s) => s.stepNumber)).toEqual([3, 1, 2]);
  });

  it('should remove duplicate set members keeping first occurrence', () => {
    const flow = normalizeFlow({ roles: ['Clerk', 'Manager', 'Clerk'] }, 'd', 'p', 'r', 'm');

    expect(flow.roles).toEqual(['Clerk', 'Manager']);
  });

  it('should preserve dangling next step references verbatim', () => {
    const flow = normalizeFlow(
      { steps: [{ step_number: 1, next_steps: [2, 99, 'end', { bad: true }] }] },
      'd',
      'p',
      'r',
      'm'
    );

    expect(flow.steps[0].nextSteps).toEqual([2, 99, 'end']);
  });
});

describe('RecoveredStepSchema', () => {
  it('should accept integer strings as step numbers', () => {
    expect(RecoveredStepSchema.parse({ step_number: ' 4 ' }).step_number).toBe(4);
  });

  it('should default non-integer step numbers to 0', () => {
    expect(RecoveredStepSchema.parse({ step_number: 1.5 }).step_number).toBe(0);
    expect(RecoveredStepSchema.parse({ step_number: 'first' }).step_number).toBe(0);
  });
});
