export type TargetType = "light" | "room";

export interface LightState {
  readonly lightId: string;
  readonly name: string;
  readonly isOn: boolean;
  /** 0–254 */
  readonly brightness: number;
  readonly hue: number | null;
  readonly saturation: number | null;
  /** Mirek, 153–500 */
  readonly colorTemp: number | null;
  readonly reachable: boolean;
}

export type AlertMode = "none" | "select" | "lselect";
export type EffectMode = "none" | "colorloop";

/**
 * Partial device command. Only the fields that are set are sent; `scene`
 * applies to rooms only.
 */
export interface LightCommand {
  readonly on?: boolean;
  readonly brightness?: number;
  readonly hue?: number;
  readonly saturation?: number;
  readonly colorTemp?: number;
  /** Deciseconds */
  readonly transitionTime?: number;
  readonly alert?: AlertMode;
  readonly effect?: EffectMode;
  readonly xy?: readonly [number, number];
  readonly scene?: string;
}

export interface DeviceGateway {
  readStates(): Promise<Map<string, LightState>>;
  setState(targetType: TargetType, targetId: string, command: LightCommand): Promise<boolean>;
  /** Raw light-level reading of an ambient light sensor. */
  readLightLevel(sensorId: string): Promise<number>;
}

export function brightnessPercent(brightness: number): number {
  return Math.round((brightness / 254) * 1000) / 10;
}
