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

import { ArrayType, ClassType, getPrimitiveType, TypeDescriptor } from '../base/Type';
import { ARRAY_BRACKETS, isPrimitiveKind, VARARGS_SUFFIX, VOID_KEYWORD } from '../common/JniConst';
import { InvalidArgumentError, JniErrorCode } from '../common/JniError';

const QUALIFIED_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;
// whitespace is allowed around brackets and varargs, nowhere else
const SUFFIX_SPACING = /\s*(\[|\]|\.\.\.)\s*/g;

/**
 * Turns a Java source-form type name into a descriptor.
 * `int[][]` and `java.lang.String...` become arrays, the primitive keywords their singletons,
 * anything else a {@link ClassType}. Nested classes are written with `$`, e.g. `java.util.Map$Entry`.
 */
export function parseJavaType(typeName: string): TypeDescriptor {
    let baseName = typeName.trim().replace(SUFFIX_SPACING, '$1');
    if (baseName.length === 0) {
        throw new InvalidArgumentError(JniErrorCode.MALFORMED_TYPE_NAME, 'Type name cannot be empty');
    }

    let dimension = 0;
    if (baseName.endsWith(VARARGS_SUFFIX)) {
        baseName = baseName.slice(0, -VARARGS_SUFFIX.length);
        dimension++;
    }
    while (baseName.endsWith(ARRAY_BRACKETS)) {
        baseName = baseName.slice(0, -ARRAY_BRACKETS.length);
        dimension++;
    }

    if (!QUALIFIED_NAME.test(baseName)) {
        throw new InvalidArgumentError(JniErrorCode.MALFORMED_TYPE_NAME, `Malformed type name: ${typeName}`);
    }
    if (baseName === VOID_KEYWORD && dimension > 0) {
        throw new InvalidArgumentError(JniErrorCode.MALFORMED_TYPE_NAME, `Array of void is not a type: ${typeName}`);
    }

    const baseType = isPrimitiveKind(baseName) ? getPrimitiveType(baseName) : new ClassType(baseName);
    return ArrayType.of(baseType, dimension);
}

export function parseJavaTypes(typeNames: string[]): TypeDescriptor[] {
    return typeNames.map((typeName) => parseJavaType(typeName));
}
