export interface PiiVeilClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
}

export interface DetectedEntity {
  entityType: string;
  start: number;
  end: number;
  text: string;
  confidence?: number;
}

export interface AnonymizeResponse {
  anonymized: string;
  mapping: Record<string, string>;
}

export interface DetectResponse {
  matches: DetectedEntity[];
  report?: {
    totals: { entities: number; characters: number; piiCharacters: number; coverage: number };
    entities: Array<{ entityType: string; count: number; averageConfidence?: number }>;
    riskLevel: 'critical' | 'high' | 'medium' | 'low';
    preview?: string;
  };
}

export class PiiVeilClient {
  constructor(private readonly options: PiiVeilClientOptions) {}

  async health() {
    return this.request<{ status: string; policy: string; detectors: string[]; overlapStrategy: string }>('/health');
  }

  async listPolicies() {
    return this.request<{ active: string; available: string[] }>('/policies');
  }

  async listDetectors() {
    return this.request<{ detectors: Array<{ id: string; description: string }> }>('/detectors');
  }

  async detect(text: string, params: { report?: boolean } = {}) {
    return this.request<DetectResponse>('/detect', { text, ...params });
  }

  async anonymize(text: string) {
    return this.request<AnonymizeResponse>('/anonymize', { text });
  }

  async anonymizeBatch(texts: string[]) {
    return this.request<{ results: AnonymizeResponse[] }>('/anonymize/batch', { texts });
  }

  async deanonymize(text: string, mapping: Record<string, string>) {
    const response = await this.request<{ text: string }>('/deanonymize', { text, mapping });
    return response.text;
  }

  private async request<T>(path: string, body?: unknown): Promise<T> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${path}`;
    const response = await fetch(url, {
      method: body === undefined ? 'GET' : 'POST',
      headers: {
        'content-type': 'application/json',
        ...(this.options.headers ?? {}),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Request failed (${response.status}): ${text}`);
    }
    return (await response.json()) as T;
  }
}
