import { Injectable } from '@nestjs/common';
import {
  HealthIndicatorService,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { REGISTRY_KINDS } from '@credentia/core';
import type { RegistryKind } from '@credentia/core';
import { RegistriesService } from '../registries/registries.service';
import { extractErrorInfo } from '../common/utils/error.utils';

/**
 * Reports how many records each registry holds. Down when any registry
 * cannot be read.
 */
@Injectable()
export class LedgerHealthIndicator {
  constructor(
    private registries: RegistriesService,
    private healthIndicatorService: HealthIndicatorService,
  ) {}

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const indicator = this.healthIndicatorService.check(key);

    try {
      const records: Partial<Record<RegistryKind, number>> = {};
      for (const kind of REGISTRY_KINDS) {
        records[kind] = await this.countRecords(kind);
      }
      return indicator.up({ records });
    } catch (error) {
      return indicator.down({ message: extractErrorInfo(error).message });
    }
  }

  private countRecords(kind: RegistryKind): Promise<number> {
    switch (kind) {
      case 'qualifications':
        return this.registries.qualifications.recordCount();
      case 'privileges':
        return this.registries.privileges.recordCount();
      case 'panels':
        return this.registries.panels.recordCount();
    }
  }
}
