import * as fs from 'fs-extra';
import { FileSystemService } from '../../core/filesystem.service';
import { FileSystemError } from '../../errors/filesystem.error';
import {
  MissingArgumentError,
  NotRegularFileError,
  PathNotFoundError,
  UsageError,
  VolumePathError,
} from '../../errors/usage.error';
import { ExitCode } from '../../types/config.types';

jest.mock('fs-extra');

const mockedFs = jest.mocked(fs);

function statsFor(isFile: boolean): fs.Stats {
  return { isFile: () => isFile } as unknown as fs.Stats;
}

describe('FileSystemService', () => {
  let fileSystemService: FileSystemService;

  beforeEach(() => {
    jest.clearAllMocks();
    fileSystemService = new FileSystemService();
  });

  describe('validateTargetFile', () => {
    it('should resolve a regular file against the working directory', async () => {
      (mockedFs.pathExists as jest.Mock).mockResolvedValue(true);
      (mockedFs.stat as jest.Mock).mockResolvedValue(statsFor(true));

      await expect(fileSystemService.validateTargetFile('src/app.ts', '/work')).resolves.toBe(
        '/work/src/app.ts',
      );
      expect(mockedFs.pathExists).toHaveBeenCalledWith('/work/src/app.ts');
    });

    it('should default to the process working directory', async () => {
      (mockedFs.pathExists as jest.Mock).mockResolvedValue(true);
      (mockedFs.stat as jest.Mock).mockResolvedValue(statsFor(true));

      await expect(fileSystemService.validateTargetFile('app.ts')).resolves.toBe(
        '/test/workspace/app.ts',
      );
    });

    it('should reject a missing argument', async () => {
      await expect(fileSystemService.validateTargetFile(undefined)).rejects.toThrow(
        MissingArgumentError,
      );
      await expect(fileSystemService.validateTargetFile('  ')).rejects.toThrow(MissingArgumentError);
    });

    it.each(['C:\\repo\\file.txt', 'd:file.txt', '\\\\server\\share\\file.txt'])(
      'should reject the volume path %s',
      async input => {
        await expect(fileSystemService.validateTargetFile(input)).rejects.toThrow(VolumePathError);
        expect(mockedFs.pathExists).not.toHaveBeenCalled();
      },
    );

    it('should reject a path that does not exist', async () => {
      (mockedFs.pathExists as jest.Mock).mockResolvedValue(false);

      await expect(fileSystemService.validateTargetFile('gone.txt', '/work')).rejects.toThrow(
        'No such file: gone.txt',
      );
      await expect(fileSystemService.validateTargetFile('gone.txt', '/work')).rejects.toBeInstanceOf(
        PathNotFoundError,
      );
    });

    it('should reject a directory', async () => {
      (mockedFs.pathExists as jest.Mock).mockResolvedValue(true);
      (mockedFs.stat as jest.Mock).mockResolvedValue(statsFor(false));

      await expect(fileSystemService.validateTargetFile('src', '/work')).rejects.toThrow(
        NotRegularFileError,
      );
    });

    it('should raise usage errors that exit with the usage code', async () => {
      const error = await fileSystemService.validateTargetFile(undefined).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UsageError);
      expect(error).toHaveProperty('exitCode', ExitCode.USAGE);
      expect(error).toHaveProperty('code', 'MISSING_ARGUMENT');
    });
  });

  describe('readFile', () => {
    it('should read file content as utf8', async () => {
      (mockedFs.readFile as jest.Mock).mockResolvedValue('line one\n');

      await expect(fileSystemService.readFile('/work/a.txt')).resolves.toBe('line one\n');
      expect(mockedFs.readFile).toHaveBeenCalledWith('/work/a.txt', 'utf8');
    });

    it('should wrap read failures', async () => {
      (mockedFs.readFile as jest.Mock).mockRejectedValue(new Error('EACCES: permission denied'));

      await expect(fileSystemService.readFile('/work/a.txt')).rejects.toThrow(FileSystemError);
    });
  });
});
