export enum SortDirection {
  ASC = 'ASC',
  DESC = 'DESC',
}

export interface SortOrder {
  property: string;
  direction: SortDirection;
}

export interface Pageable {
  page: number;
  size: number;
  sort?: SortOrder;
}

export interface Page<T> {
  content: T[];
  numberOfElements: number;
  totalElements: number;
  totalPages: number;
  number: number;
  size: number;
  offset: number;
  first: boolean;
  last: boolean;
  empty: boolean;
  sort?: SortOrder;
}

/**
 * Fields a collection of `T` can be ordered by, each mapped to the accessor
 * returning the value compared while sorting.
 */
export type SortableFields<T> = Readonly<
  Record<string, (item: T) => string | number>
>;
