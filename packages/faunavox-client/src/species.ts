import type { FaunavoxHttpClient } from './client.js';
import type { FormatsResponse, RequestOptions, SpeciesListResponse } from './types.js';

export class SpeciesResource {
  constructor(private readonly client: FaunavoxHttpClient) {}

  list(options?: RequestOptions): Promise<SpeciesListResponse> {
    return this.client.request<SpeciesListResponse>({
      method: 'GET',
      path: '/v1/species',
      options,
    });
  }

  formats(options?: RequestOptions): Promise<FormatsResponse> {
    return this.client.request<FormatsResponse>({
      method: 'GET',
      path: '/v1/formats',
      options,
    });
  }
}
