import { Test, TestingModule } from '@nestjs/testing';
import {
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import { AuthoritiesController } from './authorities.controller';
import { RegistriesService } from './registries.service';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import {
  TEST_OWNER,
  createInMemoryRegistries,
  type InMemoryRegistries,
} from './testing/in-memory-registries';

describe('AuthoritiesController', () => {
  let controller: AuthoritiesController;
  let registries: InMemoryRegistries;

  const hospital = { caller: 'hospital-1' };
  const admin = { caller: 'admin-1' };

  beforeEach(async () => {
    registries = createInMemoryRegistries();
    await registries.privileges.addAdmin({ caller: TEST_OWNER }, 'admin-1');

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AuthoritiesController],
      providers: [{ provide: RegistriesService, useValue: registries }],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: () => true })
      .compile();

    controller = module.get<AuthoritiesController>(AuthoritiesController);
  });

  describe('register', () => {
    it('should register the caller as an unverified authority', async () => {
      const result = await controller.register(hospital, 'privileges', {
        name: 'General Hospital',
        category: 'acute-care',
      });

      expect(result).toEqual({
        id: 'hospital-1',
        name: 'General Hospital',
        category: 'acute-care',
        website: null,
        location: null,
        verified: false,
        active: true,
        registeredAt: 1,
      });
    });

    it('should throw ConflictException on a second registration', async () => {
      await controller.register(hospital, 'privileges', { name: 'General' });

      await expect(
        controller.register(hospital, 'privileges', { name: 'General' }),
      ).rejects.toThrow(
        new ConflictException('Authority hospital-1 is already registered'),
      );
    });

    it('should allow the same identity in another registry', async () => {
      await controller.register(hospital, 'privileges', { name: 'General' });

      const result = await controller.register(hospital, 'panels', {
        name: 'General',
      });

      expect(result.id).toBe('hospital-1');
    });
  });

  describe('findAll', () => {
    it('should list authorities in registration order', async () => {
      await controller.register({ caller: 'hospital-2' }, 'privileges', {
        name: 'Second',
      });
      await controller.register(hospital, 'privileges', { name: 'First' });

      const result = await controller.findAll('privileges');

      expect(result.map((authority) => authority.id)).toEqual([
        'hospital-2',
        'hospital-1',
      ]);
    });
  });

  describe('findOne', () => {
    it('should throw NotFoundException for an unregistered identity', async () => {
      await expect(controller.findOne('privileges', 'ghost')).rejects.toThrow(
        new NotFoundException('Authority ghost not found'),
      );
    });
  });

  describe('setVerified', () => {
    beforeEach(async () => {
      await controller.register(hospital, 'privileges', { name: 'General' });
    });

    it('should let an admin verify an authority', async () => {
      const result = await controller.setVerified(
        admin,
        'privileges',
        'hospital-1',
        { verified: true },
      );

      expect(result.verified).toBe(true);
      expect((await controller.findOne('privileges', 'hospital-1')).verified).toBe(
        true,
      );
    });

    it('should throw ForbiddenException for a non-admin', async () => {
      await expect(
        controller.setVerified(hospital, 'privileges', 'hospital-1', {
          verified: true,
        }),
      ).rejects.toThrow(new ForbiddenException('hospital-1 is not an admin'));
    });

    it('should not treat the owner as an admin', async () => {
      await expect(
        controller.setVerified({ caller: TEST_OWNER }, 'privileges', 'hospital-1', {
          verified: true,
        }),
      ).rejects.toBeInstanceOf(ForbiddenException);
    });

    it('should throw NotFoundException for an unknown authority', async () => {
      await expect(
        controller.setVerified(admin, 'privileges', 'ghost', { verified: true }),
      ).rejects.toThrow(new NotFoundException('Authority ghost not found'));
    });
  });
});
