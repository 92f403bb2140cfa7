import {HttpErrors} from '@loopback/rest';

export abstract class ObjectUtils {
  public static isDefined<T>(raw: T): raw is NonNullable<T> {
    return raw !== null && typeof raw !== 'undefined';
  }

  public static isNull(v: unknown): boolean {
    return (
      v === null ||
      typeof v === 'undefined' ||
      Number.isNaN(v) ||
      (typeof v === 'string' && v.trim().length < 1)
    );
  }

  public static require<X, K extends keyof X>(
    obj: X,
    key: K,
  ): NonNullable<X[K]> {
    const v = obj[key];
    if (ObjectUtils.isNull(v) || !ObjectUtils.isDefined(v)) {
      throw new HttpErrors.InternalServerError(
        'Field ' + String(key) + ' is required',
      );
    }
    return v;
  }
}
