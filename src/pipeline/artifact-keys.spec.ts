import { artifactKeys, belongsToTenant, parseS3Uri, toS3Uri } from './artifact-keys';

describe('artifact keys', () => {
  it('places every artifact under the tenant prefix', () => {
    expect([
      artifactKeys.video('u1', 'r1'),
      artifactKeys.audio('u1', 'r1'),
      artifactKeys.rawTranscript('u1', 'r1'),
      artifactKeys.transcript('u1', 'r1'),
      artifactKeys.summary('u1', 'r1'),
    ]).toEqual([
      'users/u1/videos/r1.mp4',
      'users/u1/audio/r1.wav',
      'users/u1/transcripts/r1.raw.json',
      'users/u1/transcripts/r1.json',
      'users/u1/summaries/r1.json',
    ]);
  });

  it('converts between refs and s3 URIs', () => {
    const uri = toS3Uri({ bucket: 'test-bucket', key: 'users/u1/videos/r1.mp4' });

    expect(uri).toBe('s3://test-bucket/users/u1/videos/r1.mp4');
    expect(parseS3Uri(uri)).toEqual({ bucket: 'test-bucket', key: 'users/u1/videos/r1.mp4' });
    expect(parseS3Uri('https://example.test/file')).toBeNull();
  });

  it('does not treat a tenant id prefix as ownership', () => {
    expect(belongsToTenant('users/u1/videos/r1.mp4', 'u1')).toBe(true);
    expect(belongsToTenant('users/u10/videos/r1.mp4', 'u1')).toBe(false);
  });
});
