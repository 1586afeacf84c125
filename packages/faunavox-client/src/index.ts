import { AnalysisResource } from './analysis.js';
import { ArtifactsResource } from './artifacts.js';
import { FaunavoxHttpClient } from './client.js';
import { JobsResource } from './jobs.js';
import { SpeciesResource } from './species.js';
import type { FaunavoxClientConfig } from './types.js';

export class Faunavox {
  public readonly species: SpeciesResource;
  public readonly artifacts: ArtifactsResource;
  public readonly analysis: AnalysisResource;
  public readonly jobs: JobsResource;
  private readonly client: FaunavoxHttpClient;

  constructor(config: FaunavoxClientConfig = {}) {
    this.client = new FaunavoxHttpClient(config);
    this.species = new SpeciesResource(this.client);
    this.artifacts = new ArtifactsResource(this.client);
    this.analysis = new AnalysisResource(this.client);
    this.jobs = new JobsResource(this.client);
  }

  setCallerId(callerId: string): void {
    this.client.setCallerId(callerId);
  }
}

export * from './types.js';
export * from './errors.js';
