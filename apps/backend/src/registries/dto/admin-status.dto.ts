import { ApiProperty } from '@nestjs/swagger';
import type { RegistryKind } from '@credentia/core';

export class AdminStatusDto {
  @ApiProperty({ example: 'privileges' })
  registry!: RegistryKind;

  @ApiProperty({ example: 'admin-1' })
  identity!: string;

  @ApiProperty({ description: 'Whether the identity is an admin', example: true })
  admin!: boolean;
}
