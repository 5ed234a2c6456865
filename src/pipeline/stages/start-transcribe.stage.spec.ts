import { FakeTranscriber } from '../../../test/fakes/fake-workers';
import { pipelineInput } from '../../../test/fakes/fixtures';
import { ValidationError } from '../../common/pipeline-errors';
import { StartTranscribeStage } from './start-transcribe.stage';

describe('StartTranscribeStage', () => {
  const now = new Date('2024-05-01T10:20:30.000Z');
  let transcriber: FakeTranscriber;
  let stage: StartTranscribeStage;

  beforeEach(() => {
    transcriber = new FakeTranscriber();
    stage = new StartTranscribeStage(transcriber);
  });

  it('starts a job on the extracted audio', async () => {
    const started = await stage.run(pipelineInput(), { audioKey: 'users/u1/audio/r1.wav' }, now);

    expect(started.jobName).toMatch(/^meeting-transcript-r1-20240501-102030-[0-9a-f]{8}$/);
    expect(started.rawTranscriptKey).toBe('users/u1/transcripts/r1.raw.json');
    expect(transcriber.started).toEqual([
      {
        jobName: started.jobName,
        sessionId: 'r1',
        bucket: 'test-bucket',
        audioKey: 'users/u1/audio/r1.wav',
        outputKey: 'users/u1/transcripts/r1.raw.json',
        pipelineVersion: '1.0.0',
      },
    ]);
  });

  it('refuses to start without audio', async () => {
    await expect(stage.run(pipelineInput(), {}, now)).rejects.toThrow(ValidationError);
    await expect(stage.run(pipelineInput(), {}, now)).rejects.toThrow('no audio artifact for r1');
    expect(transcriber.started).toHaveLength(0);
  });
});
