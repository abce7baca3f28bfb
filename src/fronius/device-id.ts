/**
 * DeviceId - selects one device instance within a Solar API device class
 * (inverter #1, meter #0, ...).
 *
 * The Datamanager addresses devices by a small integer; anything outside
 * 0..99 is rejected at construction.
 */
export class DeviceId {
  static readonly MIN = 0;
  static readonly MAX = 99;

  private constructor(readonly value: number) {}

  /**
   * @throws RangeError if the id is not an integer in 0..99
   */
  static from(value: number): DeviceId {
    if (!Number.isInteger(value) || value < DeviceId.MIN || value > DeviceId.MAX) {
      throw new RangeError(
        `Invalid device id ${value}: expected an integer between ${DeviceId.MIN} and ${DeviceId.MAX}`,
      );
    }
    return new DeviceId(value);
  }

  /** Key used by the Datamanager in id-keyed maps (GetInverterInfo) */
  toString(): string {
    return String(this.value);
  }
}
