import { Test, TestingModule } from '@nestjs/testing';
import { ForbiddenException } from '@nestjs/common';
import { AdminsController } from './admins.controller';
import { RegistriesService } from './registries.service';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import {
  TEST_OWNER,
  createInMemoryRegistries,
  type InMemoryRegistries,
} from './testing/in-memory-registries';

describe('AdminsController', () => {
  let controller: AdminsController;
  let registries: InMemoryRegistries;

  const owner = { caller: TEST_OWNER };

  beforeEach(async () => {
    registries = createInMemoryRegistries();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AdminsController],
      providers: [{ provide: RegistriesService, useValue: registries }],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: () => true })
      .compile();

    controller = module.get<AdminsController>(AdminsController);
  });

  describe('isAdmin', () => {
    it('should report a stranger as not admin', async () => {
      const result = await controller.isAdmin('privileges', 'admin-1');

      expect(result).toEqual({
        registry: 'privileges',
        identity: 'admin-1',
        admin: false,
      });
    });
  });

  describe('addAdmin', () => {
    it('should grant admin rights when called by the owner', async () => {
      const result = await controller.addAdmin(owner, 'privileges', 'admin-1');

      expect(result).toEqual({
        registry: 'privileges',
        identity: 'admin-1',
        admin: true,
      });
      expect(await registries.privileges.isAdmin('admin-1')).toBe(true);
    });

    it('should scope admin rights to one registry', async () => {
      await controller.addAdmin(owner, 'privileges', 'admin-1');

      const result = await controller.isAdmin('panels', 'admin-1');

      expect(result.admin).toBe(false);
    });

    it('should throw ForbiddenException for a non-owner', async () => {
      await expect(
        controller.addAdmin({ caller: 'intruder' }, 'qualifications', 'intruder'),
      ).rejects.toThrow(
        new ForbiddenException('Only the owner can manage admins'),
      );
    });
  });

  describe('removeAdmin', () => {
    it('should revoke admin rights', async () => {
      await controller.addAdmin(owner, 'panels', 'admin-1');

      const result = await controller.removeAdmin(owner, 'panels', 'admin-1');

      expect(result).toEqual({
        registry: 'panels',
        identity: 'admin-1',
        admin: false,
      });
      expect(await registries.panels.isAdmin('admin-1')).toBe(false);
    });

    it('should not let an admin revoke another admin', async () => {
      await controller.addAdmin(owner, 'panels', 'admin-1');
      await controller.addAdmin(owner, 'panels', 'admin-2');

      await expect(
        controller.removeAdmin({ caller: 'admin-1' }, 'panels', 'admin-2'),
      ).rejects.toBeInstanceOf(ForbiddenException);
      expect(await registries.panels.isAdmin('admin-2')).toBe(true);
    });
  });
});
