export type OsFamily = 'debian' | 'rhel' | 'arch' | 'alpine' | 'unknown';

export interface InstallPlan {
  /** Команда, проверяющая наличие пакетного менеджера */
  probe: string;
  /** Подготовительные шаги, ошибки которых не критичны */
  prepare: string[];
  install: string[];
}

export const INSTALL_PLANS: Readonly<Record<Exclude<OsFamily, 'unknown'>, InstallPlan>> = {
  debian: {
    probe: 'command -v apt-get',
    prepare: [],
    install: ['apt-get update', 'DEBIAN_FRONTEND=noninteractive apt-get install -y wireguard wireguard-tools']
  },
  rhel: {
    probe: 'command -v yum',
    prepare: ['yum install -y epel-release'],
    install: ['yum install -y wireguard-tools']
  },
  arch: {
    probe: 'command -v pacman',
    prepare: [],
    install: ['pacman -Sy --noconfirm wireguard-tools']
  },
  alpine: {
    probe: 'command -v apk',
    prepare: [],
    install: ['apk add --update wireguard-tools']
  }
};

/** Порядок перебора пакетных менеджеров для неизвестного дистрибутива */
export const PROBE_ORDER: ReadonlyArray<Exclude<OsFamily, 'unknown'>> = ['debian', 'rhel', 'arch', 'alpine'];

const FAMILY_IDS: ReadonlyArray<[Exclude<OsFamily, 'unknown'>, readonly string[]]> = [
  ['debian', ['debian', 'ubuntu', 'raspbian', 'linuxmint']],
  ['rhel', ['rhel', 'centos', 'fedora', 'rocky', 'almalinux', 'ol']],
  ['arch', ['arch', 'manjaro']],
  ['alpine', ['alpine']]
];

function readOsReleaseField(osRelease: string, key: string): string[] {
  const match = new RegExp(`^${key}=(.*)$`, 'm').exec(osRelease);
  if (!match) return [];
  return match[1]
    .replace(/^["']|["']$/g, '')
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean);
}

/** Семейство ОС по содержимому /etc/os-release: сначала ID, затем ID_LIKE */
export function classifyOsFamily(osRelease: string): OsFamily {
  const candidates = [...readOsReleaseField(osRelease, 'ID'), ...readOsReleaseField(osRelease, 'ID_LIKE')];

  for (const id of candidates) {
    for (const [family, ids] of FAMILY_IDS) {
      if (ids.includes(id)) return family;
    }
  }
  return 'unknown';
}
