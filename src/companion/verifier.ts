import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { errorMessage } from '../errors/index.js';
import { isPlainObject } from '../utils/objects.js';

export type FindingSeverity = 'error' | 'warning';

export interface CompanionFinding {
  file: string;
  severity: FindingSeverity;
  message: string;
}

export const CONTAINER_BUILD_FILE = 'Dockerfile';
export const BUILD_SPEC_FILE = 'buildspec.yml';
export const DEPLOYMENT_MAPPING_FILE = 'appspec.yaml';
export const IMAGE_DEFINITIONS_FILE = 'imagedefinitions.json';

async function readIfExists(path: string): Promise<string | null> {
  return existsSync(path) ? readFile(path, 'utf-8') : null;
}

function loadYamlMapping(file: string, content: string, findings: CompanionFinding[]): Record<string, unknown> | null {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    findings.push({ file, severity: 'error', message: `Invalid YAML: ${errorMessage(error)}` });
    return null;
  }
  if (!isPlainObject(document)) {
    findings.push({ file, severity: 'error', message: 'Top level must be a mapping' });
    return null;
  }
  return document;
}

function requireKeys(file: string, document: Record<string, unknown>, keys: string[]): CompanionFinding[] {
  return keys
    .filter(key => document[key] === undefined)
    .map((key): CompanionFinding => ({ file, severity: 'error', message: `Missing top-level key: ${key}` }));
}

export async function verifyDockerfile(appDir: string): Promise<CompanionFinding[]> {
  const content = await readIfExists(join(appDir, CONTAINER_BUILD_FILE));
  if (content === null) {
    return [{ file: CONTAINER_BUILD_FILE, severity: 'error', message: 'File not found' }];
  }

  const instructions = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'));
  const first = instructions.find(line => !/^ARG\s/i.test(line));

  if (!first || !/^FROM\s+\S+/i.test(first)) {
    return [{ file: CONTAINER_BUILD_FILE, severity: 'error', message: 'No FROM instruction before the first build step' }];
  }
  return [];
}

/**
 * The build step must publish imagedefinitions.json for the ECS deploy action
 */
export async function verifyBuildSpec(appDir: string): Promise<CompanionFinding[]> {
  const content = await readIfExists(join(appDir, BUILD_SPEC_FILE));
  if (content === null) {
    return [{ file: BUILD_SPEC_FILE, severity: 'error', message: 'File not found' }];
  }

  const findings: CompanionFinding[] = [];
  const document = loadYamlMapping(BUILD_SPEC_FILE, content, findings);
  if (!document) {
    return findings;
  }

  findings.push(...requireKeys(BUILD_SPEC_FILE, document, ['version', 'phases', 'artifacts']));

  const artifacts = document.artifacts;
  if (isPlainObject(artifacts)) {
    const files = Array.isArray(artifacts.files) ? artifacts.files : [artifacts.files];
    if (!files.includes(IMAGE_DEFINITIONS_FILE)) {
      findings.push({
        file: BUILD_SPEC_FILE,
        severity: 'error',
        message: `artifacts.files does not include ${IMAGE_DEFINITIONS_FILE}`,
      });
    }
  } else if (artifacts !== undefined) {
    findings.push({ file: BUILD_SPEC_FILE, severity: 'error', message: 'artifacts must be a mapping' });
  }

  const phases = document.phases;
  if (isPlainObject(phases) && phases.build === undefined) {
    findings.push({ file: BUILD_SPEC_FILE, severity: 'warning', message: 'phases has no build phase' });
  }

  return findings;
}

export async function verifyAppSpec(appDir: string): Promise<CompanionFinding[]> {
  const content = await readIfExists(join(appDir, DEPLOYMENT_MAPPING_FILE));
  if (content === null) {
    return [{ file: DEPLOYMENT_MAPPING_FILE, severity: 'error', message: 'File not found' }];
  }

  const findings: CompanionFinding[] = [];
  const document = loadYamlMapping(DEPLOYMENT_MAPPING_FILE, content, findings);
  if (document) {
    findings.push(...requireKeys(DEPLOYMENT_MAPPING_FILE, document, ['version', 'Resources']));
  }
  return findings;
}

/**
 * Check the files the pipeline expects in the application repository
 */
export async function verifyCompanionFiles(appDir: string): Promise<CompanionFinding[]> {
  const results = await Promise.all([verifyDockerfile(appDir), verifyBuildSpec(appDir), verifyAppSpec(appDir)]);
  return results.flat();
}
