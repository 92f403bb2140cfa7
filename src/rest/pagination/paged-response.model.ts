import {model, Model, property} from '@loopback/repository';
import {PageableDto} from './pageable-dto.model';
import {SortDto} from './sort-dto.model';

@model()
export abstract class PagedResponse<T> extends Model {
  @property({
    type: PageableDto,
    required: true,
  })
  pageable!: PageableDto;

  @property({
    type: 'boolean',
    required: true,
  })
  last!: boolean;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  totalPages!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int64',
    },
  })
  totalElements!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  size!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  number!: number;

  @property({
    type: SortDto,
    required: true,
  })
  sort!: SortDto;

  @property({
    type: 'boolean',
    required: true,
  })
  first!: boolean;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  numberOfElements!: number;

  @property({
    type: 'boolean',
    required: true,
  })
  empty!: boolean;

  abstract content: T[];

  constructor(data?: Partial<PagedResponse<T>>) {
    super(data);
  }
}
