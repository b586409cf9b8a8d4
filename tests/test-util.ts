/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

import * as fs from "fs";
import * as path from "path";
import { pino } from "pino";
import { JsonMetadataSource } from "../src/metadata-source.js";
import { PhoneNumberUtil } from "../src/phone-number-util.js";
import { PrefixFileReader } from "../src/prefix-file-reader.js";

// Shared fixtures for tests. The metadata in tests/resources is made up for testing, and only
// loosely resembles the real numbering plans of the regions it names.

export const silentLogger = pino({ level: "silent" });

export function readResource(name: string): string {
  return fs.readFileSync(path.join(__dirname, "resources", name), { encoding: "utf8", flag: "r" });
}

export function createTestMetadataSource(): JsonMetadataSource {
  return JsonMetadataSource.create(readResource("test-metadata.json"), silentLogger);
}

export function createTestUtil(): PhoneNumberUtil {
  return new PhoneNumberUtil(createTestMetadataSource(), { logger: silentLogger });
}

export function createPrefixFileReader(name: string): PrefixFileReader {
  return PrefixFileReader.create(readResource(name), silentLogger);
}
