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

import {
    ArrayType,
    ClassType,
    IntType,
    InvalidArgumentError,
    JniErrorCode,
    LongType,
    parseJavaType,
    parseJavaTypes,
    VoidType,
} from '../src';

describe('parseJavaType', () => {
    it('maps keywords to primitive singletons', () => {
        expect(parseJavaType('int')).toBe(IntType.getInstance());
        expect(parseJavaType('void')).toBe(VoidType.getInstance());
    });

    it('maps other names to class types', () => {
        const type = parseJavaType('java.lang.String');
        expect(type).toBeInstanceOf(ClassType);
        expect(type.getQualifiedName()).toBe('java.lang.String');
        expect(parseJavaType('java.util.Map$Entry').getQualifiedName()).toBe('java.util.Map$Entry');
    });

    it('turns brackets and varargs into array levels', () => {
        const matrix = parseJavaType('java.lang.String[][]');
        expect(matrix).toBeInstanceOf(ArrayType);
        expect(matrix.toString()).toBe('java.lang.String[][]');

        expect(parseJavaType('int...').toString()).toBe('int[]');
        expect(parseJavaType('long[]...').toString()).toBe('long[][]');
        expect(parseJavaType(' byte [ ] ').toString()).toBe('byte[]');
        expect(parseJavaType('java.lang.Object ...').toString()).toBe('java.lang.Object[]');
    });

    it('parses a list in order', () => {
        const types = parseJavaTypes(['long', 'java.io.File']);
        expect(types).toHaveLength(2);
        expect(types[0]).toBe(LongType.getInstance());
        expect(types[1].getQualifiedName()).toBe('java.io.File');
    });

    it.each([
        ['', 'Type name cannot be empty'],
        ['   ', 'Type name cannot be empty'],
        ['1up', 'Malformed type name: 1up'],
        ['in t', 'Malformed type name: in t'],
        ['java.lang. Str ing', 'Malformed type name: java.lang. Str ing'],
        ['java .lang.String[]', 'Malformed type name: java .lang.String[]'],
        ['java..lang.String', 'Malformed type name: java..lang.String'],
        ['int[', 'Malformed type name: int['],
        ['List<String>', 'Malformed type name: List<String>'],
        ['void[]', 'Array of void is not a type: void[]'],
    ])('rejects %p', (typeName, message) => {
        let caught: unknown;
        try {
            parseJavaType(typeName);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(InvalidArgumentError);
        expect(caught).toMatchObject({ errCode: JniErrorCode.MALFORMED_TYPE_NAME, message });
    });
});
