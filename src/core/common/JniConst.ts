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

// java primitive keywords
export const VOID_KEYWORD = 'void';
export const BOOLEAN_KEYWORD = 'boolean';
export const BYTE_KEYWORD = 'byte';
export const CHAR_KEYWORD = 'char';
export const SHORT_KEYWORD = 'short';
export const INT_KEYWORD = 'int';
export const LONG_KEYWORD = 'long';
export const FLOAT_KEYWORD = 'float';
export const DOUBLE_KEYWORD = 'double';

export type PrimitiveKind =
    | typeof VOID_KEYWORD
    | typeof BOOLEAN_KEYWORD
    | typeof BYTE_KEYWORD
    | typeof CHAR_KEYWORD
    | typeof SHORT_KEYWORD
    | typeof INT_KEYWORD
    | typeof LONG_KEYWORD
    | typeof FLOAT_KEYWORD
    | typeof DOUBLE_KEYWORD;

const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
    VOID_KEYWORD,
    BOOLEAN_KEYWORD,
    BYTE_KEYWORD,
    CHAR_KEYWORD,
    SHORT_KEYWORD,
    INT_KEYWORD,
    LONG_KEYWORD,
    FLOAT_KEYWORD,
    DOUBLE_KEYWORD,
];

export function isPrimitiveKind(name: string): name is PrimitiveKind {
    return PRIMITIVE_KINDS.some((kind) => kind === name);
}

export const PRIMITIVE_SIGNATURES: ReadonlyMap<string, string> = new Map<string, string>([
    [VOID_KEYWORD, 'V'],
    [BOOLEAN_KEYWORD, 'Z'],
    [BYTE_KEYWORD, 'B'],
    [CHAR_KEYWORD, 'C'],
    [SHORT_KEYWORD, 'S'],
    [INT_KEYWORD, 'I'],
    [LONG_KEYWORD, 'J'],
    [FLOAT_KEYWORD, 'F'],
    [DOUBLE_KEYWORD, 'D'],
]);

// signature grammar
export const ARRAY_PREFIX = '[';
export const CLASS_PREFIX = 'L';
export const CLASS_SUFFIX = ';';
export const PARAMS_START = '(';
export const PARAMS_END = ')';
export const PACKAGE_DELIMITER = '.';
export const INTERNAL_NAME_DELIMITER = '/';

// java source form
export const ARRAY_BRACKETS = '[]';
export const VARARGS_SUFFIX = '...';
