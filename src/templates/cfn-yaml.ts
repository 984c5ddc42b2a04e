import { parse as parseYaml, YAMLMap, YAMLSeq } from 'yaml';
import type { CollectionTag, ScalarTag } from 'yaml';

// Short-form intrinsic tags and the long-form key each one expands to
const INTRINSIC_FUNCTIONS: Record<string, string> = {
  Ref: 'Ref',
  Condition: 'Condition',
  Sub: 'Fn::Sub',
  GetAtt: 'Fn::GetAtt',
  ImportValue: 'Fn::ImportValue',
  Join: 'Fn::Join',
  Select: 'Fn::Select',
  Split: 'Fn::Split',
  GetAZs: 'Fn::GetAZs',
  If: 'Fn::If',
  Equals: 'Fn::Equals',
  Not: 'Fn::Not',
  And: 'Fn::And',
  Or: 'Fn::Or',
  FindInMap: 'Fn::FindInMap',
  Base64: 'Fn::Base64',
  Cidr: 'Fn::Cidr'
};

function scalarTag(shortName: string, key: string): ScalarTag {
  return {
    tag: `!${shortName}`,
    resolve: (value: string) => {
      if (shortName === 'GetAtt') {
        const separator = value.indexOf('.');
        return { [key]: separator === -1 ? [value] : [value.slice(0, separator), value.slice(separator + 1)] };
      }
      return { [key]: value };
    }
  };
}

function collectionTag(shortName: string, key: string, collection: 'map' | 'seq'): CollectionTag {
  return {
    tag: `!${shortName}`,
    collection,
    resolve: (value: YAMLMap | YAMLSeq) => ({ [key]: value.toJSON() })
  };
}

const CLOUDFORMATION_TAGS: Array<ScalarTag | CollectionTag> = Object.entries(INTRINSIC_FUNCTIONS).flatMap(
  ([shortName, key]) => [
    scalarTag(shortName, key),
    collectionTag(shortName, key, 'seq'),
    collectionTag(shortName, key, 'map')
  ]
);

/**
 * Parse a YAML CloudFormation template, expanding short-form intrinsics
 * (!Ref, !Sub, !GetAtt, ...) to their long form.
 */
export function parseCloudFormationYaml(content: string): unknown {
  return parseYaml(content, { customTags: CLOUDFORMATION_TAGS });
}
