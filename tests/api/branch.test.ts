import fs from 'fs';
import request from 'supertest';
import { Types } from 'mongoose';
import createError from 'http-errors';
import app from '../../src/app';
import { env } from '../../src/config/env';
import { uploadDir } from '../../src/middleware/upload';
import { generateTokens } from '../../src/utils/token';

jest.mock('../../src/services/branch.service');

const branches = jest.requireMock<{ addBranch: jest.Mock }>('../../src/services/branch.service');

const companyAuth = `Bearer ${
  generateTokens({ userId: new Types.ObjectId().toHexString(), email: 'owner@example.com', userType: 'company' })
    .accessToken
}`;

const storedUploads = () => {
  const dir = uploadDir('branches');
  return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
};

afterAll(() => {
  fs.rmSync(env.UPLOAD_DIR, { recursive: true, force: true });
});

describe('POST /branches', () => {
  it('removes the uploaded media when the body fails validation', async () => {
    const before = storedUploads();

    const res = await request(app)
      .post('/branches')
      .set('Authorization', companyAuth)
      .field('phone', '555-0100')
      .attach('images', Buffer.from('not really a jpeg'), { filename: 'front.jpg', contentType: 'image/jpeg' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 400, message: 'Branch name is required' });
    expect(branches.addBranch).not.toHaveBeenCalled();
    expect(storedUploads()).toEqual(before);
  });

  it('removes the uploaded media when the insert fails', async () => {
    const before = storedUploads();
    branches.addBranch.mockRejectedValue(createError(404, 'Company not found'));

    const res = await request(app)
      .post('/branches')
      .set('Authorization', companyAuth)
      .field('name', 'Harbour')
      .attach('images', Buffer.from('not really a jpeg'), { filename: 'front.jpg', contentType: 'image/jpeg' });

    expect(res.status).toBe(404);
    expect(storedUploads()).toEqual(before);
  });

  it('passes the parsed body and stored paths to the service', async () => {
    branches.addBranch.mockResolvedValue({ _id: new Types.ObjectId().toHexString(), name: 'Harbour', status: 'pending' });

    const res = await request(app)
      .post('/branches')
      .set('Authorization', companyAuth)
      .field('name', '  Harbour  ')
      .attach('images', Buffer.from('not really a jpeg'), { filename: 'front.jpg', contentType: 'image/jpeg' });

    expect(res.status).toBe(201);
    expect(res.body.message).toBe('Branch added');
    const [kind, , body, media] = branches.addBranch.mock.calls[0];
    expect(kind).toBe('company');
    expect(body).toEqual({ name: 'Harbour' });
    expect(media.videos).toEqual([]);
    expect(media.images).toHaveLength(1);
    expect(media.images[0]).toMatch(/^tmp-test-uploads\/branches\/\d+-[0-9a-f]{12}\.jpg$/);
  });
});
