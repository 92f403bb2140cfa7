import {model, Model, property} from '@loopback/repository';

@model()
export class SortDto extends Model {
  @property({
    type: 'boolean',
    required: true,
  })
  sorted!: boolean;

  @property({
    type: 'boolean',
    required: true,
  })
  unsorted!: boolean;

  @property({
    type: 'boolean',
    required: true,
  })
  empty!: boolean;

  constructor(data?: Partial<SortDto>) {
    super(data);
  }
}
