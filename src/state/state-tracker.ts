import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import { DeploymentRecord, DeploymentStatus } from '../types/index.js';
import { StackctlError, errorMessage } from '../errors/index.js';

export const STATE_FILE_VERSION = 1;

export interface StateFile {
  version: number;
  project: string;
  records: DeploymentRecord[];
}

export interface LocalDrift {
  stage: string;
  /** Parameter keys whose value differs from the last deployment, added or removed */
  changedParameters: string[];
  templateChanged: boolean;
  drifted: boolean;
}

export type RecordPatch = Partial<Pick<DeploymentRecord, 'stackId' | 'outputs' | 'error'>>;

const ALLOWED_TRANSITIONS: Record<DeploymentStatus, DeploymentStatus[]> = {
  pending: ['applied', 'failed', 'rolled-back'],
  applied: ['pending'],
  failed: ['pending'],
  'rolled-back': ['pending'],
};

const stringMap = Joi.object().pattern(Joi.string(), Joi.string().allow(''));

const recordSchema = Joi.object<DeploymentRecord>({
  deploymentId: Joi.string().required(),
  stage: Joi.string().required(),
  stackName: Joi.string().required(),
  stackId: Joi.string(),
  parameters: stringMap.required(),
  templateHash: Joi.string().required(),
  status: Joi.string().valid('pending', 'applied', 'failed', 'rolled-back').required(),
  createdAt: Joi.string().isoDate().required(),
  updatedAt: Joi.string().isoDate().required(),
  outputs: stringMap.required(),
  error: Joi.string().allow(''),
});

const stateSchema = Joi.object<StateFile>({
  version: Joi.number().valid(STATE_FILE_VERSION).required(),
  project: Joi.string().required(),
  records: Joi.array().items(recordSchema).unique('stage').required(),
});

export function canTransition(from: DeploymentStatus, to: DeploymentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Deployment records of one project, persisted as a JSON file.
 *
 * Every mutation is written through immediately so an interrupted run leaves
 * the record of the stage it was working on in `pending`.
 */
export class StateTracker {
  private records = new Map<string, DeploymentRecord>();
  private loaded = false;

  constructor(
    private readonly filePath: string,
    private readonly project: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.records = new Map();
        this.loaded = true;
        return;
      }
      throw new Error(`Failed to read state file ${this.filePath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StackctlError('STATE_CORRUPT', `State file ${this.filePath} is not valid JSON: ${errorMessage(error)}`, {
        remediation: 'Restore the file from a backup or remove it and re-apply the stages',
      });
    }

    const { error, value } = stateSchema.validate(parsed, { abortEarly: false });
    if (error) {
      throw new StackctlError(
        'STATE_CORRUPT',
        `State file ${this.filePath} is invalid: ${error.details.map(detail => detail.message).join('; ')}`
      );
    }
    if (value.project !== this.project) {
      throw new StackctlError(
        'STATE_CORRUPT',
        `State file ${this.filePath} belongs to project ${value.project}, not ${this.project}`,
        { remediation: 'Point settings.state_file at a file of its own for each project' }
      );
    }

    this.records = new Map(value.records.map(record => [record.stage, record]));
    this.loaded = true;
  }

  get(stage: string): DeploymentRecord | undefined {
    this.ensureLoaded();
    return this.records.get(stage);
  }

  list(): DeploymentRecord[] {
    this.ensureLoaded();
    return [...this.records.values()];
  }

  /**
   * Start a deployment of a stage: the record becomes `pending` under a new deployment id
   */
  async begin(
    stage: string,
    stackName: string,
    parameters: Record<string, string>,
    templateHash: string
  ): Promise<DeploymentRecord> {
    this.ensureLoaded();
    const existing = this.records.get(stage);
    // A pending record is left behind by an interrupted run and may be restarted
    if (existing && existing.status !== 'pending') {
      this.assertTransition(stage, existing.status, 'pending');
    }

    const timestamp = this.now().toISOString();
    const record: DeploymentRecord = {
      deploymentId: uuidv4(),
      stage,
      stackName,
      ...(existing?.stackId && { stackId: existing.stackId }),
      parameters: { ...parameters },
      templateHash,
      status: 'pending',
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
      outputs: existing?.outputs ?? {},
    };

    await this.commit(new Map(this.records).set(stage, record));
    return record;
  }

  async transition(stage: string, status: DeploymentStatus, patch: RecordPatch = {}): Promise<DeploymentRecord> {
    this.ensureLoaded();
    const existing = this.records.get(stage);
    if (!existing) {
      throw new StackctlError('INVALID_TRANSITION', `No deployment record exists for stage ${stage}`, { stage });
    }
    this.assertTransition(stage, existing.status, status);

    const record: DeploymentRecord = {
      ...existing,
      ...patch,
      status,
      updatedAt: this.now().toISOString(),
    };
    if (status === 'applied') {
      delete record.error;
    }

    await this.commit(new Map(this.records).set(stage, record));
    return record;
  }

  async remove(stage: string): Promise<boolean> {
    this.ensureLoaded();
    if (!this.records.has(stage)) {
      return false;
    }
    const records = new Map(this.records);
    records.delete(stage);
    await this.commit(records);
    return true;
  }

  /**
   * Compare the parameters and template of a stage against its last recorded deployment
   */
  localDrift(stage: string, parameters: Record<string, string>, templateHash: string): LocalDrift {
    const record = this.get(stage);
    if (!record) {
      return { stage, changedParameters: [], templateChanged: false, drifted: false };
    }

    const keys = new Set([...Object.keys(record.parameters), ...Object.keys(parameters)]);
    const changedParameters = [...keys].filter(key => record.parameters[key] !== parameters[key]).sort();
    const templateChanged = record.templateHash !== templateHash;

    return {
      stage,
      changedParameters,
      templateChanged,
      drifted: templateChanged || changedParameters.length > 0,
    };
  }

  private assertTransition(stage: string, from: DeploymentStatus, to: DeploymentStatus): void {
    if (!canTransition(from, to)) {
      throw new StackctlError('INVALID_TRANSITION', `Stage ${stage} cannot move from ${from} to ${to}`, { stage });
    }
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new Error('State has not been loaded; call load() first');
    }
  }

  /**
   * Records in memory change only once the file holding them is written
   */
  private async commit(records: Map<string, DeploymentRecord>): Promise<void> {
    await this.save(records);
    this.records = records;
  }

  private async save(records: Map<string, DeploymentRecord>): Promise<void> {
    const state: StateFile = {
      version: STATE_FILE_VERSION,
      project: this.project,
      records: [...records.values()],
    };

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new Error(`Failed to write state file ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
