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

import path from 'path';
import { LOG_LEVEL, SignatureConfig, toSignatureOptions } from '../src';

const RESOURCES = path.join(__dirname, 'resources', 'config');

describe('SignatureConfig', () => {
    it('loads the bundled defaults', () => {
        const config = new SignatureConfig();
        expect(config.getOptions()).toEqual({ enableCache: true, logLevel: LOG_LEVEL.ERROR });
        expect(config.isCacheEnabled()).toBe(true);
        expect(config.getLogLevel()).toBe(LOG_LEVEL.ERROR);
    });

    it('lets constructor options override the defaults', () => {
        const config = new SignatureConfig({ enableCache: false });
        expect(config.isCacheEnabled()).toBe(false);
        expect(config.getLogLevel()).toBe(LOG_LEVEL.ERROR);
    });

    it('merges a JSON file and drops unknown keys', () => {
        const config = new SignatureConfig();
        expect(config.buildFromJson(path.join(RESOURCES, 'disable-cache.json'))).toBe(true);
        expect(config.getOptions()).toEqual({ enableCache: false, logLevel: LOG_LEVEL.DEBUG });
    });

    it('keeps its options when the file is missing', () => {
        const config = new SignatureConfig({ logLevel: LOG_LEVEL.WARN });
        expect(config.buildFromJson(path.join(RESOURCES, 'missing.json'))).toBe(false);
        expect(config.getOptions()).toEqual({ enableCache: true, logLevel: LOG_LEVEL.WARN });
    });

    it('keeps its options when the file is not valid JSON', () => {
        const config = new SignatureConfig();
        expect(config.buildFromJson(path.join(RESOURCES, 'broken.json'))).toBe(false);
        expect(config.isCacheEnabled()).toBe(true);
    });
});

describe('toSignatureOptions', () => {
    it('keeps only recognised values', () => {
        expect(toSignatureOptions({ enableCache: 'yes', logLevel: 'LOUD', extra: 1 })).toEqual({});
        expect(toSignatureOptions({ logLevel: 'TRACE' })).toEqual({ logLevel: LOG_LEVEL.TRACE });
    });

    it('ignores non-objects', () => {
        expect(toSignatureOptions(null)).toEqual({});
        expect(toSignatureOptions('enableCache')).toEqual({});
    });
});
