import { Injectable } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { TrackedWorkflow } from '../../src/decorators/tracked-workflow.decorator';
import { DuplicateRegistrationError } from '../../src/errors/duplicate-registration.error';
import { WorkflowNotRegisteredError } from '../../src/errors/workflow-not-registered.error';
import type { WorkflowMetadata } from '../../src/interfaces/workflow-metadata.interface';
import { WorkflowCatalog } from '../../src/services/workflow-catalog.service';
import { TRACKED_WORKFLOW_METADATA } from '../../src/telemetry.constants';
import { checkoutWorkflow, createCatalog } from '../helpers';

const signupWorkflow: WorkflowMetadata = {
  workflowId: 'signup',
  states: [{ id: 'form' }, { id: 'verify', name: 'Verify email' }],
  transitions: [{ id: 'submit', fromState: 'form', toState: 'verify' }],
  initialStateIds: ['form'],
};

@TrackedWorkflow(signupWorkflow)
@Injectable()
class SignupFlow {}

class UntrackedService {}

describe('TrackedWorkflow', () => {
  it('should attach the metadata to the class', () => {
    expect(Reflect.getMetadata(TRACKED_WORKFLOW_METADATA, SignupFlow)).toBe(
      signupWorkflow,
    );
  });
});

describe('WorkflowCatalog', () => {
  it('should register workflows given in the options', () => {
    const catalog = createCatalog([checkoutWorkflow]);

    expect(catalog.get('checkout')).toBe(checkoutWorkflow);
    expect(catalog.getAll()).toEqual([
      { workflowId: 'checkout', metadata: checkoutWorkflow, source: 'options' },
    ]);
  });

  it('should discover decorated providers', () => {
    const discovery = {
      getProviders: () => [
        { metatype: SignupFlow },
        { metatype: UntrackedService },
        { metatype: null },
      ],
    } as unknown as DiscoveryService;
    const catalog = new WorkflowCatalog(discovery, new Reflector(), {
      workflows: [],
    });

    catalog.onModuleInit();

    expect(catalog.getAll()).toEqual([
      { workflowId: 'signup', metadata: signupWorkflow, source: 'SignupFlow' },
    ]);
  });

  it('should reject a workflow id registered twice', () => {
    const catalog = createCatalog([checkoutWorkflow]);

    expect(() => catalog.register(checkoutWorkflow)).toThrow(
      DuplicateRegistrationError,
    );
    expect(() => catalog.register(checkoutWorkflow)).toThrow(
      'Duplicate workflow id "checkout". Both options and manual declare the same workflow.',
    );
  });

  it('should throw WorkflowNotRegisteredError from getOrThrow', () => {
    const catalog = createCatalog();

    expect(catalog.get('missing')).toBeUndefined();
    expect(() => catalog.getOrThrow('missing')).toThrow(WorkflowNotRegisteredError);
  });

  it('should map state ids to names, falling back to the id', () => {
    const catalog = createCatalog([signupWorkflow]);

    expect(catalog.stateNameMap('signup')).toEqual({
      form: 'form',
      verify: 'Verify email',
    });
    expect(catalog.stateNameMap('missing')).toEqual({});
    expect(catalog.stateNameMap(null)).toEqual({});
  });

  describe('metadata validation', () => {
    let catalog: WorkflowCatalog;

    beforeEach(() => {
      catalog = createCatalog();
    });

    it('should reject duplicate state ids', () => {
      expect(() =>
        catalog.register({
          workflowId: 'broken',
          states: [{ id: 'a' }, { id: 'a' }],
          transitions: [],
        }),
      ).toThrow('Workflow metadata broken: duplicate state id "a"');
    });

    it('should reject transitions that reference unknown states', () => {
      expect(() =>
        catalog.register({
          workflowId: 'broken',
          states: [{ id: 'a' }],
          transitions: [{ id: 't', fromState: 'a', toState: 'b' }],
        }),
      ).toThrow('Workflow metadata broken: transition "t" references unknown state "b"');
    });

    it('should reject unknown initial states', () => {
      expect(() =>
        catalog.register({
          workflowId: 'broken',
          states: [{ id: 'a' }],
          transitions: [],
          initialStateIds: ['z'],
        }),
      ).toThrow('Workflow metadata broken: initial state "z" does not exist');
    });

    it('should reject an empty workflow id', () => {
      expect(() =>
        catalog.register({ workflowId: '', states: [], transitions: [] }),
      ).toThrow('Workflow metadata workflowId must be a non-empty string');
      expect(catalog.getAll()).toEqual([]);
    });
  });
});
