import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { REGISTRY_KINDS } from '@credentia/core';
import type { RegistryKind } from '@credentia/core';

@Injectable()
export class RegistryKindPipe implements PipeTransform<string, RegistryKind> {
  transform(value: string): RegistryKind {
    const kind = REGISTRY_KINDS.find((candidate) => candidate === value);
    if (!kind) {
      throw new BadRequestException(
        `Unknown registry '${value}'. Expected one of: ${REGISTRY_KINDS.join(', ')}`,
      );
    }
    return kind;
  }
}
