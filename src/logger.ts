/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import { pino, Logger } from "pino";
import { env } from "./config.js";

/**
 * Root logger for the library. Output is JSON on stdout, at the level given by
 * `PHONE_NUMBERS_LOG_LEVEL` (default "warn").
 */
export const logger: Logger = pino({ name: "phone-numbers", level: env.PHONE_NUMBERS_LOG_LEVEL });

/** Returns a child of the given logger (or the root logger) tagged with a component name. */
export function childLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export type { Logger };
