import {model, Model, property} from '@loopback/repository';
import {SortDto} from './sort-dto.model';

@model()
export class PageableDto extends Model {
  @property({
    type: SortDto,
    required: true,
  })
  sort!: SortDto;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int64',
    },
  })
  offset!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  pageNumber!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  pageSize!: number;

  @property({
    type: 'boolean',
    required: true,
  })
  paged!: boolean;

  @property({
    type: 'boolean',
    required: true,
  })
  unpaged!: boolean;

  constructor(data?: Partial<PageableDto>) {
    super(data);
  }
}
