import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { TemplateStore, hashTemplateBody } from '../template-store.js';
import { isStackctlError } from '../../errors/index.js';

const context = { stackNames: { network: 'shop-network' } };

const TOPIC_YAML = `AWSTemplateFormatVersion: '2010-09-09'
Parameters:
  TopicName:
    Type: String
    Default: events
Resources:
  Topic:
    Type: AWS::SNS::Topic
    Properties:
      TopicName: !Ref TopicName
Outputs:
  TopicArn:
    Value: !Ref Topic
    Export:
      Name: !Sub '\${AWS::StackName}-TopicArn'
`;

const BUCKET_YAML = `AWSTemplateFormatVersion: '2010-09-09'
Transform: AWS::Serverless-2016-10-31
Metadata:
  Owner: platform
Parameters:
  Env:
    Type: String
    AllowedValues: [dev, prod]
Resources:
  Bucket:
    Type: AWS::S3::Bucket
    UpdateReplacePolicy: Retain
    Properties:
      BucketName: !Sub '\${Env}-assets'
`;

describe('TemplateStore', () => {
  let baseDir: string;
  let store: TemplateStore;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'stackctl-templates-'));
    store = new TemplateStore({ baseDir });
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('should hash template bodies with SHA-256', () => {
    expect(hashTemplateBody('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  describe('built-in templates', () => {
    it('should generate the template of a built-in kind', async () => {
      const loaded = await store.load({ name: 'container', template: 'builtin:container' }, context);

      expect(loaded.source).toBe('builtin:container');
      expect(loaded.document.Parameters?.NetworkStackName.Default).toBe('shop-network');
      expect(JSON.parse(loaded.body)).toEqual(JSON.parse(JSON.stringify(loaded.document)));
      expect(loaded.hash).toBe(hashTemplateBody(loaded.body));
    });

    it('should send compact JSON when minifying', async () => {
      const minified = new TemplateStore({ baseDir, minify: true });

      const loaded = await minified.load({ name: 'network', template: 'builtin:network' }, context);

      expect(loaded.body.includes('\n')).toBe(false);
    });

    it('should reject an unknown kind', async () => {
      await expect(store.load({ name: 'db', template: 'builtin:database' }, context)).rejects.toThrow(
        'Unknown built-in template builtin:database for stage db'
      );
    });
  });

  describe('template files', () => {
    it('should read a YAML template relative to the base directory', async () => {
      await writeFile(join(baseDir, 'topic.yml'), TOPIC_YAML);

      const loaded = await store.load({ name: 'events', template: 'topic.yml' }, context);

      expect(loaded.source).toBe(join(baseDir, 'topic.yml'));
      expect(loaded.body).toBe(TOPIC_YAML);
      expect(loaded.hash).toBe(hashTemplateBody(TOPIC_YAML));
      expect(loaded.document.Resources.Topic.Properties).toEqual({ TopicName: { Ref: 'TopicName' } });
      expect(loaded.document.Outputs?.TopicArn.Export).toEqual({ Name: { 'Fn::Sub': '${AWS::StackName}-TopicArn' } });
    });

    it('should keep every section of the parsed file', async () => {
      await writeFile(join(baseDir, 'bucket.yml'), BUCKET_YAML);

      const loaded = await store.load({ name: 'assets', template: 'bucket.yml' }, context);

      expect(loaded.raw).toEqual({
        AWSTemplateFormatVersion: '2010-09-09',
        Transform: 'AWS::Serverless-2016-10-31',
        Metadata: { Owner: 'platform' },
        Parameters: { Env: { Type: 'String', AllowedValues: ['dev', 'prod'] } },
        Resources: {
          Bucket: {
            Type: 'AWS::S3::Bucket',
            UpdateReplacePolicy: 'Retain',
            Properties: { BucketName: { 'Fn::Sub': '${Env}-assets' } }
          }
        }
      });
      expect('Transform' in loaded.document).toBe(false);
    });

    it('should use the generated document as the raw form of a built-in', async () => {
      const loaded = await store.load({ name: 'network', template: 'builtin:network' }, context);

      expect(loaded.raw).toBe(loaded.document);
    });

    it('should read JSON from .json and .template files', async () => {
      const body = JSON.stringify({ Resources: { Topic: { Type: 'AWS::SNS::Topic' } } });
      await writeFile(join(baseDir, 'topic.json'), body);
      await writeFile(join(baseDir, 'topic.template'), body);

      const fromJson = await store.load({ name: 'a', template: 'topic.json' }, context);
      const fromTemplate = await store.load({ name: 'b', template: join(baseDir, 'topic.template') }, context);

      expect(fromJson.document.Resources.Topic.Type).toBe('AWS::SNS::Topic');
      expect(fromTemplate.document.Resources.Topic.Type).toBe('AWS::SNS::Topic');
    });

    it('should read each file once', async () => {
      await writeFile(join(baseDir, 'topic.yml'), TOPIC_YAML);
      const first = await store.load({ name: 'events', template: 'topic.yml' }, context);
      await writeFile(join(baseDir, 'topic.yml'), 'not: [a template');

      const second = await store.load({ name: 'events', template: 'topic.yml' }, context);

      expect(second).toBe(first);
    });

    it('should report a missing file', async () => {
      const path = join(baseDir, 'missing.yml');

      await expect(store.load({ name: 'events', template: 'missing.yml' }, context)).rejects.toThrow(
        `Template file not found for stage events: ${path}`
      );
    });

    it('should report a file that does not parse', async () => {
      await writeFile(join(baseDir, 'broken.yml'), 'Resources: [unclosed');

      const error = await store.load({ name: 'events', template: 'broken.yml' }, context).catch((caught: unknown) => caught);

      expect(isStackctlError(error) && error.code).toBe('TEMPLATE_INVALID');
      expect(isStackctlError(error) && error.message.startsWith(`Failed to parse template ${join(baseDir, 'broken.yml')}: `)).toBe(true);
    });

    it('should report a file that is not a template', async () => {
      await writeFile(join(baseDir, 'empty.yml'), 'Description: nothing here\n');

      await expect(store.load({ name: 'events', template: 'empty.yml' }, context)).rejects.toThrow(
        `Template ${join(baseDir, 'empty.yml')} is invalid: Template must contain at least one resource`
      );
    });
  });
});
