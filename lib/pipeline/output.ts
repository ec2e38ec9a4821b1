/**
 * Sends merged documents to the downstream API.
 */

import axios, { type AxiosInstance } from "axios";
import { OutputDispatchError, errorMessage } from "../errors.js";
import type { MergedDocument } from "./core/schemas.js";

export interface OutputDispatcherOptions {
  apiUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export class OutputDispatcher {
  private readonly http: AxiosInstance;

  constructor(private readonly options: OutputDispatcherOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 30000 });
  }

  /**
   * POST the document as JSON. Resolves with the response status.
   *
   * @throws OutputDispatchError on a non-2xx response or a network failure
   */
  async dispatch(document: MergedDocument): Promise<number> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers["x-api-key"] = this.options.apiKey;

    try {
      const response = await this.http.post<unknown>(this.options.apiUrl, document, { headers });
      return response.status;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        throw new OutputDispatchError(
          `Output API responded ${err.response.status} for ${document.documentId}`,
          document.documentId,
          err.response.status,
          { cause: err }
        );
      }
      throw new OutputDispatchError(
        `Output API request failed for ${document.documentId}: ${errorMessage(err)}`,
        document.documentId,
        undefined,
        { cause: err }
      );
    }
  }
}
