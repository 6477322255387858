/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './levels/levels.js';
export * from './utils/errors.js';
export * from './utils/paths.js';
export * from './debug/DebugLogger.js';
export * from './debug/ConfigurationManager.js';
export * from './debug/types.js';
export * from './config/settings.js';
export * from './config/configLayer.js';
export * from './config/configParser.js';
export * from './config/configLoader.js';
export * from './config/storage.js';
export * from './config/glob.js';
export * from './config/sections.js';
export * from './config/config.js';
export * from './filter/filterSpec.js';
export * from './filter/dateResolver.js';
export * from './filter/lineEvaluator.js';
export * from './filter/logfiles.js';
