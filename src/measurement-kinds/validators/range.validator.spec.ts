import { RangeValidator } from './range.validator';
import { OutOfRangeError } from '../../common/measurement.errors';

describe('RangeValidator', () => {
  const flow = new RangeValidator({
    kind: 'flow',
    unit: 'm3/h',
    description: 'Volumetric flow rate',
    min: 0,
    max: 1000,
  });

  it('should accept values inside the range, bounds included', () => {
    expect(flow.validate(0)).toBe(0);
    expect(flow.validate(12.5)).toBe(12.5);
    expect(flow.validate(1000)).toBe(1000);
  });

  it('should fold negative zero into zero', () => {
    expect(Object.is(flow.validate(-0), 0)).toBe(true);
  });

  it('should reject values below the minimum with the violated bound', () => {
    let caught: unknown;
    try {
      flow.validate(-0.5);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OutOfRangeError);
    if (!(caught instanceof OutOfRangeError)) return;
    const error = caught;
    expect(error.bound).toEqual({ side: 'min', limit: 0 });
    expect(error.kind).toBe('flow');
    expect(error.value).toBe(-0.5);
    expect(error.message).toBe("Value -0.5 for 'flow' is below the minimum of 0");
  });

  it('should reject values above the maximum with the violated bound', () => {
    expect(() => flow.validate(1000.1)).toThrow(
      "Value 1000.1 for 'flow' is above the maximum of 1000",
    );
  });

  it('should leave unbounded sides open', () => {
    const open = new RangeValidator({
      kind: 'level',
      unit: 'm',
      description: 'Level',
    });

    expect(open.validate(-1e12)).toBe(-1e12);
    expect(open.validate(1e12)).toBe(1e12);
  });

  it('should reject kind tokens that are not usable as partition names', () => {
    expect(
      () => new RangeValidator({ kind: 'Flow Rate', unit: 'm3/h', description: '' }),
    ).toThrow("Invalid measurement kind token: 'Flow Rate'");
  });

  it('should reject an inverted range', () => {
    expect(
      () =>
        new RangeValidator({ kind: 'flow', unit: 'm3/h', description: '', min: 5, max: 1 }),
    ).toThrow("Invalid range for 'flow': min 5 > max 1");
  });
});
