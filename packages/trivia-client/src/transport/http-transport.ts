export type TransportRequestOptions = {
  signal?: AbortSignal
}

/**
 * Minimal HTTP capability the client needs: a GET that yields the body as text.
 * Status codes are not inspected; the API reports failures in the body.
 */
export interface HttpTransport {
  get(url: string, options?: TransportRequestOptions): Promise<string>
}

export class FetchTransport implements HttpTransport {
  constructor(private readonly headers: Record<string, string> = { accept: 'application/json' }) {}

  async get(url: string, options: TransportRequestOptions = {}): Promise<string> {
    const response = await fetch(url, { headers: this.headers, signal: options.signal })
    return response.text()
  }
}
