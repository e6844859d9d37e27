import path from 'path';
import { which } from 'zx';

export interface JavaLocation {
  explicit?: string;
  javaHome?: string;
}

export function javaBinaryName(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'java.exe' : 'java';
}

/**
 * Find the java executable used to start the console launcher.
 * An explicit path is made absolute and an explicit bare name is looked up on
 * PATH. A bare name that cannot be found is the last resort; the launcher
 * reports it as a process error.
 */
export async function locateJavaExecutable(location: JavaLocation = {}): Promise<string> {
  if (location.explicit) {
    if (isBareName(location.explicit)) {
      return (await which(location.explicit, { nothrow: true })) ?? location.explicit;
    }
    return path.resolve(location.explicit);
  }
  if (location.javaHome) {
    return path.resolve(location.javaHome, 'bin', javaBinaryName());
  }
  const found = await which('java', { nothrow: true });
  return found ?? 'java';
}

function isBareName(executable: string): boolean {
  return !executable.includes('/') && !executable.includes(path.sep);
}
