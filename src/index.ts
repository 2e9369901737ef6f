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

// core/base
export * from './core/base/Type';

// core/common
export * from './core/common/JniConst';
export * from './core/common/JniError';

// core/signature
export * from './core/signature/JniSignatureGenerator';
export { SignatureCache, MapSignatureCache, NoopSignatureCache } from './core/signature/SignatureCache';
export { parseJavaType, parseJavaTypes } from './core/signature/JavaTypeParser';

export { SignatureConfig, SignatureOptions, toSignatureOptions } from './Config';

// utils
export { LOG_LEVEL, LOG_MODULE_TYPE } from './utils/logger';
export { default as Logger } from './utils/logger';
