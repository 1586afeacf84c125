import type { FaunavoxHttpClient } from './client.js';
import type { AudioArtifact, AudioFormat, RequestOptions, UploadParams, UploadResponse } from './types.js';

const CONTENT_TYPES: Record<AudioFormat, string> = {
  wav: 'audio/wav',
  mp3: 'audio/mpeg',
  flac: 'audio/flac',
};

export class ArtifactsResource {
  constructor(private readonly client: FaunavoxHttpClient) {}

  upload(params: UploadParams, options?: RequestOptions): Promise<UploadResponse> {
    return this.client.request<UploadResponse>({
      method: 'POST',
      path: '/v1/artifacts',
      query: {
        species: params.species,
        format: params.format,
        filename: params.filename,
        location: params.location,
        recorded_at: params.recorded_at,
      },
      binary: { data: params.audio, contentType: CONTENT_TYPES[params.format] },
      options,
    });
  }

  retrieve(artifactId: string, options?: RequestOptions): Promise<AudioArtifact> {
    return this.client.request<AudioArtifact>({
      method: 'GET',
      path: `/v1/artifacts/${encodeURIComponent(artifactId)}`,
      options,
    });
  }
}
