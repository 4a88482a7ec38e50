/**
 * The objects the gateway bridges: a button counter on one constrained device
 * and an LED switch on another.
 */

import { createResourceSchema, makeObjectInstancePath, makeResourcePath } from '@ledbridge/types';
import type { ResourceSchema } from '@ledbridge/types';

export const PROVISIONING_OBJECT_ID = 20001;
export const PROVISIONING_INSTANCE_ID = 0;

export const BUTTON_CLIENT_ID = 'ButtonDevice';
export const BUTTON_OBJECT_ID = 3200;
export const BUTTON_RESOURCE_ID = 5501;

export const LED_CLIENT_ID = 'LedDevice';
export const LED_OBJECT_ID = 3311;
export const LED_RESOURCE_ID = 5850;

export const DEFAULT_RESOURCE_SCHEMA: ResourceSchema = createResourceSchema([
  {
    id: BUTTON_OBJECT_ID,
    name: 'DigitalInput',
    clientId: BUTTON_CLIENT_ID,
    resources: [{ id: BUTTON_RESOURCE_ID, name: 'Counter', type: 'integer' }],
  },
  {
    id: LED_OBJECT_ID,
    name: 'LightControl',
    clientId: LED_CLIENT_ID,
    resources: [{ id: LED_RESOURCE_ID, name: 'On/Off', type: 'boolean' }],
  },
]);

/**
 * Where the counter is read and where the derived state is written.
 */
export interface BridgeBinding {
  sourceClientId: string;
  /** Integer resource polled on the server */
  sourcePath: string;
  targetClientId: string;
  /** Boolean resource written on the server and set on the client */
  targetPath: string;
  /** Instance created on the client before the first set */
  targetInstancePath: string;
}

export const DEFAULT_BINDING: BridgeBinding = {
  sourceClientId: BUTTON_CLIENT_ID,
  sourcePath: makeResourcePath(BUTTON_OBJECT_ID, 0, BUTTON_RESOURCE_ID),
  targetClientId: LED_CLIENT_ID,
  targetPath: makeResourcePath(LED_OBJECT_ID, 0, LED_RESOURCE_ID),
  targetInstancePath: makeObjectInstancePath(LED_OBJECT_ID, 0),
};
