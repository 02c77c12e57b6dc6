/*---------------------------------------------------------
 * Copyright (C) Microsoft Corporation. All rights reserved.
 *--------------------------------------------------------*/

export * from './de';
export * from './errors';
export * from './format/index';
export * from './lifetime';
export * as mapping from './mapping/index';
export * from './model';
export * from './observe';
export * from './reader';
export * from './ser';
export * from './visitor';
