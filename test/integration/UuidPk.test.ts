/**
 * UUID Primary Key Integration Tests
 */

import 'reflect-metadata';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { include, isUuid } from '../../src';
import type { Client } from '../../src';
import { Car, Device, Fleet, User, createTestClient, seedBlog, type Blog } from '../helpers/setup';

describe('UUID primary keys', () => {
  let client: Client;
  let blog: Blog;

  beforeEach(async () => {
    client = createTestClient();
    blog = await seedBlog(client);
  });

  afterEach(async () => {
    await client.close();
  });

  it('should generate a key when none is given', async () => {
    const device = await client.entity(Device).create({ name: 'Phone' }).exec();
    expect(isUuid(device.id)).toBe(true);
  });

  it('should keep a supplied key', async () => {
    const id = '0b6d2f4e-8a51-4c3b-9f27-5e1d7c9a3b42';
    const device = await client.entity(Device).create({ id, name: 'Tablet' }).exec();
    expect(device.id).toBe(id);

    const found = await client.entity(Device).findUnique(Device.id.equals(id)).exec();
    expect(found?.name).toBe('Tablet');
  });

  it('should generate a distinct key per row', async () => {
    const devices = await client
      .entity(Device)
      .createMany([{ name: 'A' }, { name: 'B' }])
      .exec();
    expect(new Set(devices.map((d) => d.id)).size).toBe(2);
  });

  it('should load devices through the owner', async () => {
    const devices = client.entity(Device);
    await devices.create({ name: 'Laptop', ownerId: blog.alice.id }).exec();
    await devices.create({ name: 'Watch', ownerId: blog.alice.id }).exec();

    const alice = await client
      .entity(User)
      .findUnique(User.id.equals(blog.alice.id))
      .with(include('devices').orderBy('name'))
      .exec();

    expect(alice?.devices?.map((d) => d.name)).toEqual(['Laptop', 'Watch']);
  });

  it('should connect a device by owner email and back again by key', async () => {
    const devices = client.entity(Device);
    const device = await devices.create({ name: 'Phone' }).connect('owner', User.email.equals('bob@example.com')).exec();
    expect(device.ownerId).toBe(blog.bob.id);

    const moved = await devices
      .update(Device.id.equals(device.id), { name: 'Old phone' })
      .connect('owner', User.id.equals(blog.alice.id))
      .exec();
    expect(moved.id).toBe(device.id);
    expect(moved.ownerId).toBe(blog.alice.id);
    expect(moved.name).toBe('Old phone');
  });

  describe('keys stored in upper case', () => {
    const FLEET_ID = 'A0B1C2D3-E4F5-4A6B-8C7D-9E0F1A2B3C4D';

    beforeEach(async () => {
      await client.entity(Fleet).create({ id: FLEET_ID, name: 'North' }).exec();
    });

    it('should load children of the parent key as stored', async () => {
      await client.entity(Car).create({ plate: 'N-1', fleetId: FLEET_ID, driverId: blog.alice.id }).exec();

      const fleet = await client.entity(Fleet).findUnique(Fleet.id.equals(FLEET_ID)).with(include('cars')).exec();

      expect(fleet?.id).toBe(FLEET_ID);
      expect(fleet?.cars?.map((c) => c.plate)).toEqual(['N-1']);
    });

    it('should connect by key without changing its case', async () => {
      const car = await client
        .entity(Car)
        .create({ plate: 'N-2', driverId: blog.bob.id })
        .connect('fleet', Fleet.id.equals(FLEET_ID))
        .exec();

      expect(car.fleetId).toBe(FLEET_ID);
    });

    it('should connect through a looked-up key without changing its case', async () => {
      const car = await client
        .entity(Car)
        .create({ plate: 'N-3', driverId: blog.bob.id })
        .connect('fleet', Fleet.name.equals('North'))
        .exec();
      expect(car.fleetId).toBe(FLEET_ID);

      const loaded = await client.entity(Car).findUnique(Car.id.equals(car.id)).with(include('fleet')).exec();
      expect(loaded?.fleet?.name).toBe('North');
    });
  });
});
