import * as path from 'node:path';
import { createTestContext, readArtifact, removeTempDir, type TestContext } from '../__tests__/utils';

const CAMPAIGNS = 'POST https://connect.mailerlite.com/api/campaigns';

describe('Email tools', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await removeTempDir(ctx.dir);
  });

  describe('send_email_campaign', () => {
    it('should skip when MailerLite is not configured', async () => {
      ctx = await createTestContext();

      await expect(ctx.bindings.send_email_campaign.run({ subject: 'Hi', content: 'Body' })).resolves.toEqual({
        status: 'skipped',
        reason: 'MAILERLITE_API_KEY not configured',
      });
      expect(ctx.calls).toHaveLength(0);
    });

    it('should create a regular campaign for a group', async () => {
      ctx = await createTestContext({
        env: { MAILERLITE_API_KEY: 'test-mailerlite-key', MAILERLITE_FROM_EMAIL: 'team@example.com' },
        routes: { [CAMPAIGNS]: { data: { data: { id: 4242 } } } },
      });

      const result = await ctx.bindings.send_email_campaign.run({
        subject: 'Welcome aboard',
        content: '<p>Hello</p>',
        group_id: 'g-1',
      });

      expect(result).toEqual({ status: 'created', subject: 'Welcome aboard', campaignId: '4242' });
      expect(ctx.calls[0]?.header('Authorization')).toBe('Bearer test-mailerlite-key');
      expect(ctx.calls[0]?.body).toEqual({
        name: 'Auto Campaign - 2026-10-19 09:05',
        type: 'regular',
        emails: [
          { subject: 'Welcome aboard', from_name: 'Marketing Bot', content: '<p>Hello</p>', from: 'team@example.com' },
        ],
        groups: ['g-1'],
      });
    });

    it('should target all subscribers without a group', async () => {
      ctx = await createTestContext({
        env: { MAILERLITE_API_KEY: 'test-mailerlite-key' },
        routes: { [CAMPAIGNS]: { data: { data: { id: 'c-9' } } } },
      });

      await ctx.bindings.send_email_campaign.run({ subject: 'News', content: 'Body' });

      expect(ctx.calls[0]?.body).toEqual({
        name: 'Auto Campaign - 2026-10-19 09:05',
        type: 'regular',
        emails: [{ subject: 'News', from_name: 'Marketing Bot', content: 'Body' }],
      });
    });

    it('should fail on a rejected request', async () => {
      ctx = await createTestContext({
        env: { MAILERLITE_API_KEY: 'test-mailerlite-key' },
        routes: { [CAMPAIGNS]: { status: 422, data: 'The subject field is required.' } },
      });

      await expect(ctx.bindings.send_email_campaign.run({ subject: 'x', content: 'y' })).rejects.toThrow(
        'MailerLite API error: 422 - The subject field is required.'
      );
    });
  });

  describe('save_email_draft', () => {
    it('should number drafts by sequence position', async () => {
      ctx = await createTestContext();

      const result = await ctx.bindings.save_email_draft.run({
        subject: 'Welcome to MarketBot',
        content: 'Glad you are here.',
        sequence_position: 1,
      });

      const expectedPath = path.join(ctx.dir, 'emails', 'seq01-20261019-090507.md');
      expect(result).toEqual({ status: 'saved', path: expectedPath });
      await expect(readArtifact(expectedPath)).resolves.toBe(
        '# Email Draft\n\n' +
          '**Subject:** Welcome to MarketBot\n' +
          '**Sequence Position:** 1\n' +
          '**Created:** 2026-10-19 09:05\n\n---\n\n' +
          'Glad you are here.'
      );
    });

    it('should reject a position below one', async () => {
      ctx = await createTestContext();
      const binding = ctx.bindings.save_email_draft;

      expect(() => binding.parameters.parse({ subject: 'x', content: 'y', sequence_position: 0 })).toThrow();
      expect(binding.parameters.parse({ subject: 'x', content: 'y' })).toEqual({
        subject: 'x',
        content: 'y',
        sequence_position: 1,
      });
    });
  });
});
