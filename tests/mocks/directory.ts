/**
 * Scripted contact source standing in for the directory
 */

import type { ContactSource } from "../../src/directory/client.js";

export type ScriptedResponse = unknown[] | Error;

export class FakeContactSource implements ContactSource {
  calls = 0;
  private responses: ScriptedResponse[];
  private gate: Promise<void> | null = null;

  constructor(...responses: ScriptedResponse[]) {
    this.responses = responses;
  }

  /** Queue the next response. The last one is repeated once the queue runs dry. */
  respondWith(response: ScriptedResponse): this {
    this.responses.push(response);
    return this;
  }

  /** Hold every following fetch until `gate` settles. */
  holdUntil(gate: Promise<void>): this {
    this.gate = gate;
    return this;
  }

  async fetchContacts(): Promise<unknown[]> {
    this.calls++;
    if (this.gate !== null) {
      await this.gate;
    }

    const next =
      this.responses.length > 1 ? this.responses.shift() : this.responses[0];
    if (next === undefined) {
      return [];
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
