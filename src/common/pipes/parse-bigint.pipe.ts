import { ArgumentMetadata, Injectable, PipeTransform } from '@nestjs/common';
import { parseUnsigned } from '../amounts';

@Injectable()
export class ParseBigIntPipe implements PipeTransform<string, bigint> {
  transform(value: string, metadata: ArgumentMetadata): bigint {
    return parseUnsigned(value, metadata.data ?? 'value');
  }
}
