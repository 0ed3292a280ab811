import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  EpochClock,
  createRegistrySuite,
  panelRegistry,
  privilegeRegistry,
  qualificationRegistry,
} from '@credentia/core';
import type {
  CredentialRegistry,
  PanelRegistry,
  PrivilegeRegistry,
  QualificationRegistry,
  RegistryKind,
} from '@credentia/core';
import { DatabaseService } from '../database/database.service';
import { AuditService } from '../audit/audit.service';
import type { Env } from '../config/env.validation';
import { PostgresLedgerStore } from './postgres-ledger.store';

/**
 * Operations every registry shares, regardless of its record payload.
 */
export type RegistryAdministration = Pick<
  CredentialRegistry<unknown, string>,
  | 'kind'
  | 'owner'
  | 'addAdmin'
  | 'removeAdmin'
  | 'isAdmin'
  | 'registerAuthority'
  | 'setAuthorityVerified'
  | 'getAuthority'
  | 'listAuthorities'
>;

/**
 * The three registries, stored in PostgreSQL. Every time they record or
 * compare is ledger time: unix seconds from an EpochClock, never decreasing.
 * It is not a raw wall clock.
 */
@Injectable()
export class RegistriesService {
  readonly qualifications: QualificationRegistry;
  readonly privileges: PrivilegeRegistry;
  readonly panels: PanelRegistry;

  constructor(
    database: DatabaseService,
    config: ConfigService<Env, true>,
    auditService: AuditService,
  ) {
    const suite = createRegistrySuite({
      owner: config.get('OWNER_ID', { infer: true }),
      clock: new EpochClock(),
      auditLogger: auditService,
      stores: {
        qualifications: new PostgresLedgerStore(
          database,
          qualificationRegistry,
        ),
        privileges: new PostgresLedgerStore(database, privilegeRegistry),
        panels: new PostgresLedgerStore(database, panelRegistry),
      },
    });

    this.qualifications = suite.qualifications;
    this.privileges = suite.privileges;
    this.panels = suite.panels;
  }

  registry(kind: RegistryKind): RegistryAdministration {
    switch (kind) {
      case 'qualifications':
        return this.qualifications;
      case 'privileges':
        return this.privileges;
      case 'panels':
        return this.panels;
    }
  }
}
