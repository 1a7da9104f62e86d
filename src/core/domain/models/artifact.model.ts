/**
 * Descriptor of a file produced by a pipeline
 */
export interface Artifact {
  /**
   * File name shown to the customer (e.g. "Document-<order>.pdf")
   */
  name: string;
  url: string;
  contentType: string;
}

export function isArtifact(value: unknown): value is Artifact {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'url' in value &&
    typeof value.url === 'string' &&
    'contentType' in value &&
    typeof value.contentType === 'string'
  );
}
