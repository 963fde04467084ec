import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { NoLabelsFoundError } from '../../../src/errors/RetentionErrors';
import { GmailApi, GmailProvider } from '../../../src/provider/GmailProvider';
import { DisposalAction } from '../../../src/types';

function createGmailMock() {
  return {
    users: {
      labels: {
        list: jest.fn<GmailApi['users']['labels']['list']>(),
        create: jest.fn<GmailApi['users']['labels']['create']>(),
      },
      messages: {
        list: jest.fn<GmailApi['users']['messages']['list']>(),
        get: jest.fn<GmailApi['users']['messages']['get']>(),
        batchModify: jest.fn<GmailApi['users']['messages']['batchModify']>(),
        batchDelete: jest.fn<GmailApi['users']['messages']['batchDelete']>(),
      },
    },
  };
}

describe('GmailProvider', () => {
  let gmail: ReturnType<typeof createGmailMock>;
  let provider: GmailProvider;

  beforeEach(() => {
    gmail = createGmailMock();
    gmail.users.messages.batchModify.mockResolvedValue({});
    gmail.users.messages.batchDelete.mockResolvedValue({});
    provider = new GmailProvider(gmail);
  });

  describe('listLabels', () => {
    it('should map labels and drop incomplete entries', async () => {
      gmail.users.labels.list.mockResolvedValue({
        data: {
          labels: [
            { id: 'INBOX', name: 'INBOX', type: 'system' },
            { id: 'Label_1', name: 'promo', type: 'user' },
            { id: 'Label_2' },
          ],
        },
      });

      await expect(provider.listLabels()).resolves.toEqual([
        { id: 'INBOX', name: 'INBOX', type: 'system' },
        { id: 'Label_1', name: 'promo', type: 'user' },
      ]);
      expect(gmail.users.labels.list).toHaveBeenCalledWith({ userId: 'me' });
    });

    it('should throw NoLabelsFoundError for an empty mailbox', async () => {
      gmail.users.labels.list.mockResolvedValue({ data: {} });
      await expect(provider.listLabels()).rejects.toThrow(NoLabelsFoundError);
    });
  });

  describe('getMessageSummaries', () => {
    it('should read subject and date headers in input order', async () => {
      gmail.users.messages.get.mockImplementation(async (params) => ({
        data: {
          id: params.id,
          payload: {
            headers: [
              { name: 'subject', value: `Subject of ${params.id ?? ''}` },
              { name: 'Date', value: 'Mon, 1 Jan 2024 10:00:00 +0000' },
            ],
          },
        },
      }));

      await expect(provider.getMessageSummaries(['m1', 'm2'])).resolves.toEqual([
        { id: 'm1', subject: 'Subject of m1', date: 'Mon, 1 Jan 2024 10:00:00 +0000' },
        { id: 'm2', subject: 'Subject of m2', date: 'Mon, 1 Jan 2024 10:00:00 +0000' },
      ]);
      expect(gmail.users.messages.get).toHaveBeenCalledWith({
        userId: 'me',
        id: 'm1',
        format: 'metadata',
        metadataHeaders: ['Subject', 'Date'],
      });
    });

    it('should leave out missing headers', async () => {
      gmail.users.messages.get.mockResolvedValue({ data: { id: 'm1', payload: {} } });
      await expect(provider.getMessageSummaries(['m1'])).resolves.toEqual([{ id: 'm1' }]);
    });

    it('should skip messages that no longer exist', async () => {
      gmail.users.messages.get.mockImplementation(async (params) => {
        if (params.id === 'gone') {
          throw Object.assign(new Error('Requested entity was not found.'), { code: 404 });
        }
        return { data: { id: params.id, payload: { headers: [{ name: 'Subject', value: 'kept' }] } } };
      });

      await expect(provider.getMessageSummaries(['gone', 'm2'])).resolves.toEqual([{ id: 'm2', subject: 'kept' }]);
    });

    it('should propagate other failures', async () => {
      gmail.users.messages.get.mockRejectedValue(Object.assign(new Error('Rate limit exceeded'), { code: 429 }));
      await expect(provider.getMessageSummaries(['m1'])).rejects.toThrow('Rate limit exceeded');
    });
  });

  describe('searchMessages', () => {
    it('should pass the predicate and cap the page size', async () => {
      gmail.users.messages.list.mockResolvedValue({
        data: { messages: [{ id: 'm1' }, {}, { id: 'm2' }], nextPageToken: 'next', resultSizeEstimate: 2 },
      });

      const page = await provider.searchMessages('label:promo older_than:30d', 'tok', 800);

      expect(page).toEqual({ ids: ['m1', 'm2'], nextPageToken: 'next' });
      expect(gmail.users.messages.list).toHaveBeenCalledWith({
        userId: 'me',
        q: 'label:promo older_than:30d',
        pageToken: 'tok',
        maxResults: 500,
      });
    });

    it('should return no token on the last page', async () => {
      gmail.users.messages.list.mockResolvedValue({ data: { nextPageToken: null } });
      await expect(provider.searchMessages('q', undefined, 10)).resolves.toEqual({
        ids: [],
        nextPageToken: undefined,
      });
    });
  });

  describe('batchDispose', () => {
    it('should trash by moving messages out of the inbox into Trash', async () => {
      const result = await provider.batchDispose(DisposalAction.TRASH, ['m1', 'm2']);

      expect(result).toEqual({ succeeded: ['m1', 'm2'], failed: [] });
      expect(gmail.users.messages.batchModify).toHaveBeenCalledWith({
        userId: 'me',
        requestBody: { ids: ['m1', 'm2'], addLabelIds: ['TRASH'], removeLabelIds: ['INBOX'] },
      });
      expect(gmail.users.messages.batchDelete).not.toHaveBeenCalled();
    });

    it('should delete permanently with batchDelete', async () => {
      await provider.batchDispose(DisposalAction.DELETE, ['m1']);
      expect(gmail.users.messages.batchDelete).toHaveBeenCalledWith({
        userId: 'me',
        requestBody: { ids: ['m1'] },
      });
    });

    it('should skip the call for an empty batch', async () => {
      await expect(provider.batchDispose(DisposalAction.TRASH, [])).resolves.toEqual({ succeeded: [], failed: [] });
      expect(gmail.users.messages.batchModify).not.toHaveBeenCalled();
    });

    it('should refuse more ids than Gmail accepts', async () => {
      const ids = Array.from({ length: 1001 }, (_, i) => `m${i}`);
      await expect(provider.batchDispose(DisposalAction.DELETE, ids)).rejects.toThrow(RangeError);
    });

    it('should let a failed batch call propagate', async () => {
      gmail.users.messages.batchDelete.mockRejectedValue(new Error('Rate limit exceeded'));
      await expect(provider.batchDispose(DisposalAction.DELETE, ['m1'])).rejects.toThrow('Rate limit exceeded');
    });
  });

  describe('ensureLabel', () => {
    it('should reuse an existing label', async () => {
      gmail.users.labels.list.mockResolvedValue({
        data: { labels: [{ id: 'Label_7', name: 'retention-processed/rule-1-1-years' }] },
      });

      await expect(provider.ensureLabel('retention-processed/rule-1-1-years')).resolves.toBe('Label_7');
      await expect(provider.ensureLabel('retention-processed/rule-1-1-years')).resolves.toBe('Label_7');
      expect(gmail.users.labels.create).not.toHaveBeenCalled();
      expect(gmail.users.labels.list).toHaveBeenCalledTimes(1);
    });

    it('should create a missing label', async () => {
      gmail.users.labels.list.mockResolvedValue({ data: { labels: [] } });
      gmail.users.labels.create.mockResolvedValue({ data: { id: 'Label_8', name: 'marker' } });

      await expect(provider.ensureLabel('marker')).resolves.toBe('Label_8');
      expect(gmail.users.labels.create).toHaveBeenCalledWith({
        userId: 'me',
        requestBody: { name: 'marker', labelListVisibility: 'labelShow', messageListVisibility: 'show' },
      });
    });

    it('should pick up a label created concurrently', async () => {
      gmail.users.labels.list
        .mockResolvedValueOnce({ data: { labels: [] } })
        .mockResolvedValueOnce({ data: { labels: [{ id: 'Label_9', name: 'marker' }] } });
      gmail.users.labels.create.mockRejectedValue(Object.assign(new Error('Label name exists'), { status: 409 }));

      await expect(provider.ensureLabel('marker')).resolves.toBe('Label_9');
    });

    it('should rethrow other create failures', async () => {
      gmail.users.labels.list.mockResolvedValue({ data: { labels: [] } });
      gmail.users.labels.create.mockRejectedValue(Object.assign(new Error('Forbidden'), { status: 403 }));

      await expect(provider.ensureLabel('marker')).rejects.toThrow('Forbidden');
    });
  });

  it('should apply a label with batchModify', async () => {
    await provider.applyLabel('Label_3', ['m1', 'm2']);
    expect(gmail.users.messages.batchModify).toHaveBeenCalledWith({
      userId: 'me',
      requestBody: { ids: ['m1', 'm2'], addLabelIds: ['Label_3'] },
    });
  });
});
