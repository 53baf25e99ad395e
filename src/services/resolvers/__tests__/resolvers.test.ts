import { MastodonThreadResolver, BlueskyThreadResolver, ThreadResolverRegistry } from '..';
import { NotFoundError, NetworkError } from '@/core/errors';
import { MastodonContextSchema } from '@/types/mastodon';
import { BlueskyThreadNodeSchema } from '@/types/bluesky';
import {
  blueskyPostJson,
  blueskyUser,
  makePost,
  mastodonAccountJson,
  mastodonUser
} from '@/__tests__/fixtures';

describe('MastodonThreadResolver', () => {
  const context = MastodonContextSchema.parse({
    ancestors: [
      { id: '1', created_at: '2024-05-01T10:00:00.000Z', account: mastodonAccountJson('10', 'root@example.social') },
      { id: '2', created_at: '2024-05-01T10:05:00.000Z', account: mastodonAccountJson('11', 'bob@remote.example') }
    ],
    descendants: [
      { id: '4', created_at: '2024-05-01T10:15:00.000Z', account: mastodonAccountJson('11', 'bob@remote.example') },
      { id: '5', created_at: '2024-05-01T10:20:00.000Z', account: mastodonAccountJson('12', 'carol@other.example') }
    ]
  });

  it('should collect unique authors of ancestors, descendants and the post', async () => {
    const api = { getStatusContext: jest.fn().mockResolvedValue(context) };
    const resolver = new MastodonThreadResolver(api);
    const post = makePost({
      id: '3',
      author: mastodonUser('alice@example.social'),
      replyTo: { postId: '2' }
    });

    const { participants } = await resolver.resolveParticipants(post);

    expect(api.getStatusContext).toHaveBeenCalledWith('acc-1', '3', undefined);
    expect(participants.toArray().map(identity => identity.value)).toEqual([
      'alice@example.social',
      'root@example.social',
      'bob@remote.example',
      'carol@other.example'
    ]);
  });

  it('should report the first ancestor as the root author', async () => {
    const api = { getStatusContext: jest.fn().mockResolvedValue(context) };
    const resolver = new MastodonThreadResolver(api);

    const { rootAuthor } = await resolver.resolveParticipants(
      makePost({ id: '3', author: mastodonUser('bob@remote.example'), replyTo: { postId: '2' } })
    );

    expect(rootAuthor).toEqual(mastodonUser('root@example.social'));
  });

  it('should leave the root author unknown without ancestors', async () => {
    const api = {
      getStatusContext: jest.fn().mockResolvedValue(MastodonContextSchema.parse({ ancestors: [], descendants: [] }))
    };
    const resolver = new MastodonThreadResolver(api);

    const { rootAuthor } = await resolver.resolveParticipants(makePost({ id: '3', replyTo: { postId: '2' } }));

    expect(rootAuthor).toBeUndefined();
  });

  it('should look up the root when it is known', async () => {
    const api = { getStatusContext: jest.fn().mockResolvedValue(context) };
    const resolver = new MastodonThreadResolver(api);

    await resolver.resolveParticipants(makePost({ id: '3', replyTo: { postId: '2', rootPostId: '1' } }));

    expect(api.getStatusContext).toHaveBeenCalledWith('acc-1', '1', undefined);
  });

  it('should propagate resolution errors', async () => {
    const api = { getStatusContext: jest.fn().mockRejectedValue(new NetworkError('HTTP 502', 502)) };
    const resolver = new MastodonThreadResolver(api);

    await expect(resolver.resolveParticipants(makePost({ replyTo: { postId: '2' } }))).rejects.toBeInstanceOf(NetworkError);
  });
});

describe('BlueskyThreadResolver', () => {
  const rootUri = 'at://did:plc:root/app.bsky.feed.post/1';

  it('should walk every reply branch from the root', async () => {
    const thread = BlueskyThreadNodeSchema.parse({
      post: blueskyPostJson(rootUri, 'did:plc:root'),
      replies: [
        {
          post: blueskyPostJson('at://did:plc:bob/app.bsky.feed.post/2', 'did:plc:bob'),
          replies: [
            { post: blueskyPostJson('at://did:plc:carol/app.bsky.feed.post/3', 'did:plc:carol') },
            { uri: 'at://did:plc:gone/app.bsky.feed.post/4', notFound: true }
          ]
        },
        { post: blueskyPostJson('at://did:plc:bob/app.bsky.feed.post/5', 'did:plc:bob') }
      ]
    });
    const api = { getPostThread: jest.fn().mockResolvedValue(thread) };
    const resolver = new BlueskyThreadResolver(api);
    const post = makePost({
      platform: 'bluesky',
      id: 'at://did:plc:alice/app.bsky.feed.post/6',
      author: blueskyUser('did:plc:alice'),
      replyTo: { postId: rootUri, rootPostId: rootUri }
    });

    const { participants, rootAuthor } = await resolver.resolveParticipants(post);

    expect(api.getPostThread).toHaveBeenCalledWith('acc-1', rootUri, undefined);
    expect(participants.size).toBe(4);
    expect(participants.has(blueskyUser('did:plc:carol'))).toBe(true);
    expect(participants.has(blueskyUser('did:plc:gone'))).toBe(false);
    expect(rootAuthor).toEqual(blueskyUser('did:plc:root'));
  });

  it('should take the root author from the topmost visible parent', async () => {
    const postUri = 'at://did:plc:alice/app.bsky.feed.post/9';
    const thread = BlueskyThreadNodeSchema.parse({
      post: blueskyPostJson(postUri, 'did:plc:alice'),
      parent: {
        post: blueskyPostJson('at://did:plc:bob/app.bsky.feed.post/8', 'did:plc:bob'),
        parent: { post: blueskyPostJson(rootUri, 'did:plc:root') }
      }
    });
    const api = { getPostThread: jest.fn().mockResolvedValue(thread) };
    const resolver = new BlueskyThreadResolver(api);
    const post = makePost({ platform: 'bluesky', id: postUri, author: blueskyUser('did:plc:alice') });

    const { rootAuthor } = await resolver.resolveParticipants(post);

    expect(api.getPostThread).toHaveBeenCalledWith('acc-1', postUri, undefined);
    expect(rootAuthor).toEqual(blueskyUser('did:plc:root'));
  });

  it('should reject with NotFoundError when the root is unavailable', async () => {
    const api = {
      getPostThread: jest.fn().mockResolvedValue(BlueskyThreadNodeSchema.parse({ uri: rootUri, notFound: true }))
    };
    const resolver = new BlueskyThreadResolver(api);
    const post = makePost({ platform: 'bluesky', replyTo: { postId: rootUri, rootPostId: rootUri } });

    await expect(resolver.resolveParticipants(post)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('ThreadResolverRegistry', () => {
  it('should select the resolver by platform', () => {
    const mastodon = new MastodonThreadResolver({ getStatusContext: jest.fn() });
    const registry = new ThreadResolverRegistry([mastodon]);

    expect(registry.get('mastodon')).toBe(mastodon);
    expect(registry.get('bluesky')).toBeUndefined();
    expect(registry.platforms()).toEqual(['mastodon']);
  });
});
