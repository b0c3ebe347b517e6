import { z } from 'zod';

import { BluetoothDeviceAddress } from './bluetooth-device-address';
import type { SpeedSteps } from './command-dispatcher';
import { DEFAULT_STRIDE_FACTOR } from './display-fields';
import type { StrideCalibration } from './display-fields';
import { ConfigurationError, describeError } from './errors';

const deviceAddress = z.string({ required_error: 'is required' }).transform((value, context) => {
  try {
    return BluetoothDeviceAddress.fromString(value);
  } catch (error) {
    context.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
    return z.NEVER;
  }
});

const EnvironmentSchema = z.object({
  TREADMILL_ADDRESS: deviceAddress,
  USER_HEIGHT_CM: z.coerce.number().int().min(50).max(250),
  STRIDE_FACTOR: z.coerce.number().positive().max(1).default(DEFAULT_STRIDE_FACTOR),
  SPEED_STEP_UP: z.coerce.number().int().positive().default(2),
  SPEED_STEP_DOWN: z.coerce.number().int().positive().default(1),
  SPEED_UNIT_KMH: z.coerce.number().positive().default(0.1),
  MAX_SPEED_KMH: z.coerce.number().positive().default(20),
});

export type AppConfig = Readonly<{
  address: BluetoothDeviceAddress;
  calibration: StrideCalibration;
  speedSteps: SpeedSteps;
  speedUnitKmh: number;
  maxSpeedKmh: number;
}>;

/**
 * Reads the process configuration. Empty variables count as unset.
 */
export function loadConfig(environment: NodeJS.ProcessEnv): AppConfig {
  const present = Object.fromEntries(
    Object.entries(environment).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = EnvironmentSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);

    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      context: { variables: parsed.error.issues.map(issue => issue.path.join('.')) },
    });
  }

  const env = parsed.data;

  return Object.freeze({
    address: env.TREADMILL_ADDRESS,
    calibration: Object.freeze({ userHeightCm: env.USER_HEIGHT_CM, strideFactor: env.STRIDE_FACTOR }),
    speedSteps: Object.freeze({ increase: env.SPEED_STEP_UP, decrease: env.SPEED_STEP_DOWN }),
    speedUnitKmh: env.SPEED_UNIT_KMH,
    maxSpeedKmh: env.MAX_SPEED_KMH,
  });
}
