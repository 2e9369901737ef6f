/*
 * Copyright (c) 2024 Huawei Device Co., Ltd.
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import fs from 'fs';
import path from 'path';
import Logger, { isLogLevel, LOG_LEVEL, LOG_MODULE_TYPE } from './utils/logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.JNISIG, 'Config');

export interface SignatureOptions {
    enableCache?: boolean;
    logLevel?: LOG_LEVEL;
}

const CONFIG_FILENAME = 'jnisig.json';
const DEFAULT_CONFIG_FILE = path.join(__dirname, '../config', CONFIG_FILENAME);

/**
 * Keeps the recognised keys of a parsed JSON object and drops everything else.
 */
export function toSignatureOptions(raw: unknown): SignatureOptions {
    const options: SignatureOptions = {};
    if (typeof raw !== 'object' || raw === null) {
        return options;
    }
    if ('enableCache' in raw && typeof raw.enableCache === 'boolean') {
        options.enableCache = raw.enableCache;
    }
    if ('logLevel' in raw && isLogLevel(raw.logLevel)) {
        options.logLevel = raw.logLevel;
    }
    return options;
}

export class SignatureConfig {
    private options: SignatureOptions;

    constructor(options?: SignatureOptions) {
        try {
            this.options = toSignatureOptions(JSON.parse(fs.readFileSync(DEFAULT_CONFIG_FILE, 'utf-8')));
        } catch (error) {
            this.options = {};
        }
        if (options) {
            this.options = { ...this.options, ...options };
        }
    }

    public getOptions(): SignatureOptions {
        return this.options;
    }

    /**
     * Merge the options of a JSON file over the current ones.
     * @param configJsonPath - path of a file such as `{ "enableCache": false, "logLevel": "DEBUG" }`.
     * @returns false, with the options untouched, when the file is missing or unreadable.
     */
    public buildFromJson(configJsonPath: string): boolean {
        if (!fs.existsSync(configJsonPath)) {
            logger.error(`Your configJsonPath: "${configJsonPath}" is not exist.`);
            return false;
        }
        let configurationsText: string;
        try {
            configurationsText = fs.readFileSync(configJsonPath, 'utf-8');
        } catch (error) {
            logger.error(`Error reading file: ${error}`);
            return false;
        }

        let configurations: unknown;
        try {
            configurations = JSON.parse(configurationsText);
        } catch (error) {
            logger.error(`Error parsing JSON: ${error}`);
            return false;
        }
        this.options = { ...this.options, ...toSignatureOptions(configurations) };
        return true;
    }

    public isCacheEnabled(): boolean {
        return this.options.enableCache ?? true;
    }

    public getLogLevel(): LOG_LEVEL {
        return this.options.logLevel ?? LOG_LEVEL.ERROR;
    }
}
