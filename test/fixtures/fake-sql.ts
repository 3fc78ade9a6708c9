// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import { vi } from "vitest";

/** Tagged-template query received by the fake */
export interface RecordedQuery {
  /** Statement text with `$n` placeholders, whitespace collapsed */
  text: string;
  values: unknown[];
}

/** Identifier fragment produced by `sql(name)` */
export interface IdentifierFragment {
  identifier: string;
}

type Responder = (query: RecordedQuery) => unknown[] | Error;

/**
 * In-process stand-in for a postgres.js `sql` instance: records every
 * tagged-template query and answers with rows from `respond`. After `end()`
 * every query rejects, as postgres.js does with CONNECTION_ENDED.
 */
export function createFakeSql(respond: Responder = () => []) {
  const queries: RecordedQuery[] = [];
  let ended = false;

  function sql(
    first: TemplateStringsArray | string,
    ...values: unknown[]
  ): IdentifierFragment | Promise<unknown[]> {
    if (typeof first === "string") {
      return { identifier: first };
    }
    const text = first
      .reduce((acc, part, i) => `${acc}$${i}${part}`)
      .replace(/\s+/g, " ")
      .trim();
    const query = { text, values };
    queries.push(query);
    if (ended) {
      return Promise.reject(new Error("write CONNECTION_ENDED localhost:5432"));
    }
    const reply = respond(query);
    return reply instanceof Error
      ? Promise.reject(reply)
      : Promise.resolve(reply);
  }

  const end = vi.fn((_options?: { timeout?: number }) => {
    ended = true;
    return Promise.resolve();
  });
  const unsafe = vi.fn((_text: string) => Promise.resolve([]));
  const fake = Object.assign(sql, { end, unsafe });

  return {
    queries,
    end,
    unsafe,
    /** The fake typed as the postgres.js instance the backend expects */
    asSql: () => fake as unknown as Sql,
  };
}
