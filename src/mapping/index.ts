/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

export * from './containers';
export * from './enums';
export * from './ignored';
export * from './primitives';
export * from './structs';
export * from './types';
