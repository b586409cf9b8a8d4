/*~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~
 Copyright (c) 2023, David Beaumont (https://github.com/hagbard).

 This program and the accompanying materials are made available under the terms of the
 Eclipse Public License v. 2.0 available at https://www.eclipse.org/legal/epl-2.0, or the
 Apache License, Version 2.0 available at https://www.apache.org/licenses/LICENSE-2.0.

 SPDX-License-Identifier: EPL-2.0 OR Apache-2.0
 ~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~~*/

export { PhoneNumber, CountryCodeSource } from "./phone-number.js";
export type { PhoneNumberFields } from "./phone-number.js";
export { PhoneNumberType, ValidationResult, MatchType } from "./match-results.js";
export { NumberParseError, ErrorType } from "./number-parse-error.js";
export { EMPTY_NUMBER_DESC, descHasData, descHasPossibleNumberData, getNumberDescByType } from "./phone-metadata.js";
export type { NumberDesc, NumberFormat, PhoneMetadata, ShortNumberMetadata } from "./phone-metadata.js";
export {
  MetadataJsonSchema,
  AlternateFormatsJsonSchema,
  ShortNumberTerritoryJsonSchema,
  PrefixDataJsonSchema,
} from "./metadata-json.js";
export type {
  MetadataJson,
  TerritoryJson,
  AlternateFormatsJson,
  ShortNumberTerritoryJson,
  PrefixDataJson,
} from "./metadata-json.js";
export { JsonMetadataSource } from "./metadata-source.js";
export type { MetadataSource } from "./metadata-source.js";
export { RegexCache } from "./regex-cache.js";
export { PhoneNumberNormalizer } from "./phone-number-normalizer.js";
export type { StrippedExtension } from "./phone-number-normalizer.js";
export { NumberClassifier } from "./number-classifier.js";
export { PhoneNumberParser } from "./phone-number-parser.js";
export type { StrippedNationalPrefix, ExtractedCountryCode } from "./phone-number-parser.js";
export { PhoneNumberFormatter, PhoneNumberFormat } from "./phone-number-formatter.js";
export { PhoneNumberMatch } from "./phone-number-match.js";
export { PhoneNumberMatcher, Leniency } from "./phone-number-matcher.js";
export { PhoneNumberUtil } from "./phone-number-util.js";
export type { PhoneNumberUtilOptions } from "./phone-number-util.js";
export { ShortNumberInfo, ShortNumberCost } from "./short-number-info.js";
export { AsYouTypeFormatter } from "./as-you-type-formatter.js";
export { PhonePrefixMap } from "./phone-prefix-map.js";
export { PrefixFileReader } from "./prefix-file-reader.js";
export { PhoneNumberOfflineGeocoder } from "./phone-number-offline-geocoder.js";
export { PhoneNumberToCarrierMapper } from "./phone-number-to-carrier-mapper.js";
export { PhoneNumberToTimeZonesMapper } from "./phone-number-to-time-zones-mapper.js";
export { logger, childLogger } from "./logger.js";
export type { Logger } from "./logger.js";
