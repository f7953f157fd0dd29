import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { logger } from './logger.js';

export class FileSystemUtils {
  /**
   * Ensure directory exists, create if not
   */
  public static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
      logger().debug(`Directory ensured: ${dirPath}`);
    } catch (error) {
      logger().error(`Failed to create directory: ${dirPath}`, { error });
      throw error;
    }
  }

  /**
   * Check if file or directory exists
   */
  public static async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove file or directory recursively
   */
  public static async remove(path: string): Promise<void> {
    try {
      await fs.rm(path, { recursive: true });
      logger().debug(`Removed: ${path}`);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        logger().error(`Failed to remove: ${path}`, { error });
        throw error;
      }
    }
  }

  /**
   * Delete a file if it is there. Failures are logged, never thrown.
   * Resolves to whether the file is gone afterwards.
   */
  public static async discardFile(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      logger().debug(`Discarded file: ${filePath}`);
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return true;
      }
      logger().warn(`Could not discard file: ${filePath}`, { error });
      return false;
    }
  }

  /**
   * Create a temporary directory
   */
  public static async createTempDir(prefix = 'steady-download-'): Promise<string> {
    try {
      const tempDir = await fs.mkdtemp(join(tmpdir(), prefix));
      logger().debug(`Created temp directory: ${tempDir}`);
      return tempDir;
    } catch (error) {
      logger().error('Failed to create temp directory', { error });
      throw error;
    }
  }
}

// Export convenience functions
export const ensureDir = FileSystemUtils.ensureDir.bind(FileSystemUtils);
export const exists = FileSystemUtils.exists.bind(FileSystemUtils);
export const remove = FileSystemUtils.remove.bind(FileSystemUtils);
export const discardFile = FileSystemUtils.discardFile.bind(FileSystemUtils);
export const createTempDir = FileSystemUtils.createTempDir.bind(FileSystemUtils);
