import { StatusClassifier } from '../../core/status.classifier';
import { DeletedFileError, UnexpectedGitOutputError } from '../../errors/git.error';
import { FileClassification } from '../../types/status.types';
import { createFakeAdapter } from '../helpers/fake-adapter';

describe('StatusClassifier', () => {
  describe('repository location', () => {
    it('should classify a file outside any repository without further queries', async () => {
      const adapter = createFakeAdapter({
        getWorkTreeLocation: jest.fn().mockResolvedValue('outside'),
      });

      const state = await new StatusClassifier(adapter).classify('notes.txt');

      expect(state).toEqual({
        classification: FileClassification.OutsideRepo,
        isTracked: false,
        isStaged: false,
        isModified: false,
      });
      expect(adapter.isIgnored).not.toHaveBeenCalled();
      expect(adapter.getStatusCodes).not.toHaveBeenCalled();
    });

    it('should classify a file inside the git directory as internal', async () => {
      const adapter = createFakeAdapter({
        getWorkTreeLocation: jest.fn().mockResolvedValue('git-dir'),
      });

      const state = await new StatusClassifier(adapter).classify('HEAD');

      expect(state.classification).toBe(FileClassification.InternalRepoFile);
      expect(adapter.isIgnored).not.toHaveBeenCalled();
    });
  });

  describe('ignore rules', () => {
    it('should classify an ignored file without reading status or history', async () => {
      const adapter = createFakeAdapter({ isIgnored: jest.fn().mockResolvedValue(true) });

      const state = await new StatusClassifier(adapter).classify('build.log');

      expect(state).toEqual({
        classification: FileClassification.Ignored,
        isTracked: false,
        isStaged: false,
        isModified: false,
      });
      expect(adapter.isIgnored).toHaveBeenCalledWith('build.log');
      expect(adapter.hasHistory).not.toHaveBeenCalled();
      expect(adapter.getStatusCodes).not.toHaveBeenCalled();
    });

    it('should classify a tracked file by its status when check-ignore does not report it', async () => {
      // git check-ignore leaves tracked paths out even when a rule matches them
      const adapter = createFakeAdapter({
        isIgnored: jest.fn().mockResolvedValue(false),
        hasHistory: jest.fn().mockResolvedValue(true),
        getStatusCodes: jest.fn().mockResolvedValue([]),
      });

      const state = await new StatusClassifier(adapter).classify('config.local');

      expect(state.classification).toBe(FileClassification.TrackedNoChanges);
      expect(adapter.getStatusCodes).toHaveBeenCalledWith('config.local');
    });
  });

  describe('status codes', () => {
    it('should classify a file with no history and no staged change as untracked', async () => {
      const adapter = createFakeAdapter({
        hasHistory: jest.fn().mockResolvedValue(false),
        getStatusCodes: jest.fn().mockResolvedValue([{ index: '?', workingTree: '?' }]),
      });

      const state = await new StatusClassifier(adapter).classify('draft.md');

      expect(state).toEqual({
        classification: FileClassification.Untracked,
        isTracked: false,
        isStaged: false,
        isModified: false,
      });
    });

    it('should classify a staged file without history as new', async () => {
      const adapter = createFakeAdapter({
        hasHistory: jest.fn().mockResolvedValue(false),
        getStatusCodes: jest.fn().mockResolvedValue([{ index: 'A', workingTree: ' ' }]),
      });

      const state = await new StatusClassifier(adapter).classify('feature.ts');

      expect(state).toEqual({
        classification: FileClassification.NewWithChanges,
        isTracked: false,
        isStaged: true,
        isModified: false,
      });
    });

    it('should flag unstaged modifications of a new file', async () => {
      const adapter = createFakeAdapter({
        hasHistory: jest.fn().mockResolvedValue(false),
        getStatusCodes: jest.fn().mockResolvedValue([{ index: 'A', workingTree: 'M' }]),
      });

      const state = await new StatusClassifier(adapter).classify('feature.ts');

      expect(state.classification).toBe(FileClassification.NewWithChanges);
      expect(state.isModified).toBe(true);
    });

    it('should classify a clean tracked file as having no changes', async () => {
      const adapter = createFakeAdapter();

      const state = await new StatusClassifier(adapter).classify('README.md');

      expect(state).toEqual({
        classification: FileClassification.TrackedNoChanges,
        isTracked: true,
        isStaged: false,
        isModified: false,
      });
    });

    it('should read staged and unstaged flags from the two status columns', async () => {
      const adapter = createFakeAdapter({
        getStatusCodes: jest.fn().mockResolvedValue([{ index: 'M', workingTree: 'M' }]),
      });

      const state = await new StatusClassifier(adapter).classify('index.ts');

      expect(state).toEqual({
        classification: FileClassification.TrackedWithChanges,
        isTracked: true,
        isStaged: true,
        isModified: true,
      });
    });

    it('should treat an unstaged-only modification as tracked with changes', async () => {
      const adapter = createFakeAdapter({
        getStatusCodes: jest.fn().mockResolvedValue([{ index: ' ', workingTree: 'M' }]),
      });

      const state = await new StatusClassifier(adapter).classify('index.ts');

      expect(state.classification).toBe(FileClassification.TrackedWithChanges);
      expect(state.isStaged).toBe(false);
      expect(state.isModified).toBe(true);
    });

    it('should not count other index codes as staged', async () => {
      const adapter = createFakeAdapter({
        getStatusCodes: jest.fn().mockResolvedValue([{ index: 'T', workingTree: ' ' }]),
      });

      const state = await new StatusClassifier(adapter).classify('script.sh');

      expect(state.classification).toBe(FileClassification.TrackedNoChanges);
    });

    it('should fail on a deleted status code', async () => {
      const adapter = createFakeAdapter({
        getStatusCodes: jest.fn().mockResolvedValue([
          { index: 'D', workingTree: ' ' },
          { index: '?', workingTree: '?' },
        ]),
      });

      await expect(new StatusClassifier(adapter).classify('old.ts')).rejects.toThrow(DeletedFileError);
    });

    it('should fail when git reports more than one status line', async () => {
      const adapter = createFakeAdapter({
        getStatusCodes: jest.fn().mockResolvedValue([
          { index: 'M', workingTree: ' ' },
          { index: 'A', workingTree: ' ' },
        ]),
      });

      await expect(new StatusClassifier(adapter).classify('dup.ts')).rejects.toThrow(
        'Expected at most one status line for dup.ts, got 2',
      );
      await expect(new StatusClassifier(adapter).classify('dup.ts')).rejects.toBeInstanceOf(
        UnexpectedGitOutputError,
      );
    });
  });
});
