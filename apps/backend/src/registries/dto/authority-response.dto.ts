import { ApiProperty } from '@nestjs/swagger';
import type { Authority } from '@credentia/core';

export class AuthorityResponseDto {
  @ApiProperty({
    description: 'Identity that registered the authority',
    example: 'hospital-1',
  })
  id!: string;

  @ApiProperty({ example: 'General Hospital' })
  name!: string;

  @ApiProperty({ example: 'licensing-board', nullable: true, type: String })
  category!: string | null;

  @ApiProperty({
    example: 'https://general-hospital.example',
    nullable: true,
    type: String,
  })
  website!: string | null;

  @ApiProperty({ example: 'Springfield', nullable: true, type: String })
  location!: string | null;

  @ApiProperty({
    description: 'Set by a registry admin. Only verified authorities issue.',
    example: false,
  })
  verified!: boolean;

  @ApiProperty({ example: true })
  active!: boolean;

  @ApiProperty({
    description: 'Registration, in ledger time (unix seconds, never decreasing)',
    example: 1760745600,
  })
  registeredAt!: number;

  static fromAuthority(authority: Authority): AuthorityResponseDto {
    return { ...authority };
  }
}
