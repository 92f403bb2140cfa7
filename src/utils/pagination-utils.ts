import {HttpErrors} from '@loopback/rest';
import lodash from 'lodash';
import {
  Page,
  Pageable,
  SortableFields,
  SortDirection,
  SortOrder,
} from '../models/pagination/pagination.model';

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_PAGE_SIZE = 2000;

export interface PaginationOptions {
  defaultPageSize: number;
  maxPageSize: number;
}

const DEFAULT_OPTIONS: PaginationOptions = {
  defaultPageSize: DEFAULT_PAGE_SIZE,
  maxPageSize: DEFAULT_MAX_PAGE_SIZE,
};

export abstract class PaginationUtils {
  public static parsePagination(
    page: number | undefined,
    size: number | undefined,
    sort?: string,
    options: PaginationOptions = DEFAULT_OPTIONS,
  ): Pageable {
    const pageable: Pageable = {
      page: page ?? 0,
      size: size ?? options.defaultPageSize,
      sort: PaginationUtils.parseSort(sort),
    };

    if (pageable.size > options.maxPageSize) {
      throw new HttpErrors.BadRequest(
        `Page size must not exceed ${options.maxPageSize}`,
      );
    }

    return pageable;
  }

  /**
   * Parses a `property[,ASC|DESC]` sort expression. The direction defaults
   * to ascending and is matched case-insensitively.
   */
  public static parseSort(raw: string | undefined): SortOrder | undefined {
    if (typeof raw === 'undefined' || !raw.trim().length) {
      return undefined;
    }

    const parts = raw.split(',').map(p => p.trim());
    if (parts.length > 2) {
      throw new HttpErrors.BadRequest(
        'Sort expects a single property and an optional direction, got: ' +
          raw,
      );
    }

    const property = parts[0];
    if (!property.length) {
      throw new HttpErrors.BadRequest('Missing sort property');
    }

    return {
      property,
      direction:
        parts.length === 1
          ? SortDirection.ASC
          : PaginationUtils.parseDirection(parts[1]),
    };
  }

  public static paginate<T>(
    items: T[],
    pageable: Pageable,
    sortableFields: SortableFields<T>,
  ): Page<T> {
    const {page, size, sort} = pageable;

    if (!Number.isInteger(page) || page < 0) {
      throw new HttpErrors.BadRequest(
        'Page index must be a non-negative integer',
      );
    }
    if (!Number.isInteger(size) || size < 1) {
      throw new HttpErrors.BadRequest('Page size must be a positive integer');
    }

    const ordered = sort
      ? PaginationUtils.sort(items, sort, sortableFields)
      : [...items];

    const totalElements = items.length;
    const offset = page * size;
    const content = ordered.slice(offset, offset + size);

    return {
      content,
      numberOfElements: content.length,
      totalElements,
      totalPages: Math.ceil(totalElements / size),
      number: page,
      size,
      offset,
      first: page === 0,
      last: offset + content.length >= totalElements,
      empty: content.length === 0,
      sort,
    };
  }

  private static sort<T>(
    items: T[],
    order: SortOrder,
    sortableFields: SortableFields<T>,
  ): T[] {
    if (!Object.prototype.hasOwnProperty.call(sortableFields, order.property)) {
      throw new HttpErrors.BadRequest(
        'Unknown sort property: ' + order.property,
      );
    }

    // orderBy is stable: ties keep their original relative order
    return lodash.orderBy(
      items,
      [sortableFields[order.property]],
      [order.direction === SortDirection.DESC ? 'desc' : 'asc'],
    );
  }

  private static parseDirection(raw: string): SortDirection {
    switch (raw.toUpperCase()) {
      case SortDirection.ASC:
        return SortDirection.ASC;
      case SortDirection.DESC:
        return SortDirection.DESC;
      default:
        throw new HttpErrors.BadRequest('Invalid sort direction: ' + raw);
    }
  }
}
