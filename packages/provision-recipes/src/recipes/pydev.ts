import { dirname, join } from 'path';
import { generatePassword, type ConfigMutation, type Recipe } from '@sandbox-provision/engine';
import { pydevLauncher } from '../templates/index.js';
import {
  addUser,
  aptInstall,
  aptUpdate,
  asUser,
  idmapConfiguration,
  pipInstall,
  pipe,
  run,
  setPassword,
  userFullName,
} from './common.js';

export const PYDEV_DEBIAN_PACKAGES = [
  'python3',
  'python3-pip',
  'python3-psycopg2',
  'adduser',
  'sudo',
  'curl',
  'git',
  'default-jre',
];

export const PYDEV_GUI_PACKAGES = ['libgtk-3-0', 'libxtst6'];

export const PYDEV_PYTHON_PACKAGES = ['Django==4.2.16'];

export const ECLIPSE_URL =
  'https://download.eclipse.org/eclipse/downloads/drops4/R-4.30-202312010110/eclipse-platform-4.30-linux-gtk-x86_64.tar.gz';

export const ECLIPSE_REPOSITORIES = [
  'https://www.pydev.org/updates',
  'https://download.eclipse.org/releases/2023-12',
];

export const ECLIPSE_FEATURES = [
  'org.python.pydev.feature.feature.group',
  'org.eclipse.egit.feature.group',
  'org.eclipse.tm.terminal.feature.feature.group',
];

export const JAVA_BINARY = '/usr/lib/jvm/default-java/bin/java';

export const X11_MOUNT_ENTRY = '/tmp/.X11-unix tmp/.X11-unix none bind,optional,create=dir';

export const LAUNCHER_NAME = 'start-pydev';

export const pydevRecipe: Recipe = {
  role: 'pydev',
  summary: 'Eclipse with PyDev, launched on the host display through a generated script',
  backends: ['lxc'],

  plan(prefix) {
    const userName = `${prefix}_user`;
    const userPassword = generatePassword();
    const userHome = `/home/${userName}`;

    const configuration: ConfigMutation[] = [
      { type: 'append', key: 'lxc.mount.entry', value: X11_MOUNT_ENTRY },
      ...idmapConfiguration(),
    ];

    return {
      configuration,

      steps: context => [
        // The bind mount is only wanted by the launcher, not during setup
        run('Unmounting X11 directory', ['umount', '/tmp/.X11-unix']),
        aptUpdate(),
        aptInstall('Installing debian packages', PYDEV_DEBIAN_PACKAGES),
        aptInstall('Installing GUI packages', PYDEV_GUI_PACKAGES, ['--no-install-recommends']),
        pipInstall(PYDEV_PYTHON_PACKAGES),
        addUser(userName, userFullName(prefix)),
        setPassword(userName, userPassword),
        // Keeps sudo from warning about an unresolvable host name
        run('Appending container name to /etc/hosts', [
          'bash', '-c', `echo "127.0.1.1       ${context.name}" >> /etc/hosts`,
        ]),
        pipe('Downloading and extracting Eclipse IDE', ['curl', '-fsSL', ECLIPSE_URL], asUser(userName, 'tar xz')),
        run('Updating Eclipse configuration', asUser(
          userName,
          `sed -i "/-vmargs/i-data\\n${userHome}/workspace\\n-vm\\n${JAVA_BINARY}" eclipse/eclipse.ini`
        )),
        run('Installing PyDev', asUser(
          userName,
          'eclipse/eclipse -application org.eclipse.equinox.p2.director -noSplash ' +
            `-repository ${ECLIPSE_REPOSITORIES.join(',')} -installIU ${ECLIPSE_FEATURES.join(',')}`
        )),
      ],

      hostFiles: context => [
        {
          path: join(context.sandboxPath, LAUNCHER_NAME),
          contents: pydevLauncher(context.name, userName, dirname(context.sandboxPath)),
          mode: 0o744,
        },
      ],

      finalState: 'stopped',

      result: context => ({
        container_name: context.name,
        container_address: context.address,
        user_name: userName,
        user_password: userPassword,
        startup_script: join(context.sandboxPath, LAUNCHER_NAME),
      }),
    };
  },
};
