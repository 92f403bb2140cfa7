import {
  DefaultCrudRepository,
  Entity,
  Filter,
  juggler,
  Options,
} from '@loopback/repository';
import {
  Page,
  Pageable,
  SortableFields,
} from '../../models/pagination/pagination.model';
import {PaginationUtils} from '../../utils/pagination-utils';

export type PaginationFilter<T extends object> = Omit<
  Filter<T>,
  'limit' | 'skip' | 'offset'
> &
  Required<Pick<Filter<T>, 'order'>>;

export class PaginationRepository<
  T extends Entity,
  ID,
  Relations extends object = {},
> extends DefaultCrudRepository<T, ID, Relations> {
  constructor(
    entityClass: typeof Entity & {
      prototype: T;
    },
    dataSource: juggler.DataSource,
  ) {
    super(entityClass, dataSource);
  }

  /**
   * Reads the records matching `filter` in the filter's order, then sorts
   * and slices that snapshot in memory according to `pageRequest`.
   */
  public async findPage(
    filter: PaginationFilter<T>,
    pageRequest: Pageable,
    sortableFields: SortableFields<T & Relations>,
    options?: Options,
  ): Promise<Page<T & Relations>> {
    const snapshot = await this.find(filter, options);
    return PaginationUtils.paginate(snapshot, pageRequest, sortableFields);
  }
}
