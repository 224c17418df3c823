import { existsSync } from "fs";
import { homedir } from "os";
import { delimiter, join, parse } from "path";
import type { Device, UserDirectories } from "shared/types/index.js";

export type { Device, UserDirectories };

/**
 * Source of the "Places" and "Devices" shortcuts. Read wholesale whenever a
 * dialog opens or refreshes.
 */
export interface PlacesProvider {
  userDirectories(): UserDirectories | null;
  devices(): Device[];
}

function existingDir(path: string): string | null {
  return existsSync(path) ? path : null;
}

export const systemPlaces: PlacesProvider = {
  userDirectories() {
    const home = homedir();
    if (!home || !existsSync(home)) return null;

    return {
      home,
      desktop: existingDir(join(home, "Desktop")),
      documents: existingDir(join(home, "Documents")),
      downloads: existingDir(join(home, "Downloads")),
      audio: existingDir(join(home, "Music")),
      pictures: existingDir(join(home, "Pictures")),
      videos: existingDir(join(home, "Videos")),
    };
  },

  devices() {
    const root = parse(process.cwd()).root;
    const devices: Device[] = [{ name: root, mountPoint: root }];

    // Extra mount points, e.g. FILE_DIALOG_DEVICES=/mnt/usb:/media/backup
    const extra = (process.env.FILE_DIALOG_DEVICES || "").split(delimiter).filter(Boolean);
    for (const mountPoint of extra) {
      if (existsSync(mountPoint) && !devices.some((d) => d.mountPoint === mountPoint)) {
        devices.push({ name: mountPoint, mountPoint });
      }
    }

    return devices;
  },
};
