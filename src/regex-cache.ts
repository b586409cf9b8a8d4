/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

/**
 * A content-addressed cache of compiled regular expressions.
 *
 * The same pattern text recurs across many regions and number types, so compiling it once and
 * sharing the result saves a lot of work. Entries are never evicted, since the set of distinct
 * patterns is bounded by the metadata.
 *
 * Cached expressions never have the global or sticky flag, which means they hold no matching
 * state (`lastIndex`) and can be shared by any number of callers.
 */
export class RegexCache {
  private readonly cache: Map<string, RegExp> = new Map();

  /** Returns the compiled form of the given pattern, compiling it on first use. */
  getPatternForRegex(regex: string, flags: string = ""): RegExp {
    if (flags.includes("g") || flags.includes("y")) {
      throw new Error(`Stateful regular expression flags cannot be cached: '${flags}'`);
    }
    let key = flags + "/" + regex;
    let pattern = this.cache.get(key);
    if (pattern === undefined) {
      pattern = new RegExp(regex, flags);
      this.cache.set(key, pattern);
    }
    return pattern;
  }

  /** Whether the pattern matches the whole of the given string. */
  matchesEntirely(regex: string, s: string): boolean {
    return this.getPatternForRegex(`^(?:${regex})$`).test(s);
  }

  /** Matches the pattern at the start of the given string (but not necessarily all of it). */
  lookingAt(regex: string, s: string): RegExpExecArray|null {
    return this.getPatternForRegex(`^(?:${regex})`).exec(s);
  }

  containsRegex(regex: string, flags: string = ""): boolean {
    return this.cache.has(flags + "/" + regex);
  }

  size(): number {
    return this.cache.size;
  }
}
