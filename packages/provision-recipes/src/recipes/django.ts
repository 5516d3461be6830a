import { generatePassword, type Recipe } from '@sandbox-provision/engine';
import { nginxSite, uwsgiIni, uwsgiService } from '../templates/index.js';
import {
  addUser,
  aptInstall,
  aptUpdate,
  asUser,
  idmapConfiguration,
  pipInstall,
  pipe,
  emit,
  run,
  setPassword,
  userFullName,
  writeFileStep,
} from './common.js';

export const DJANGO_DEBIAN_PACKAGES = [
  'python3',
  'python3-pip',
  'python3-dev',
  'python3-psycopg2',
  'build-essential',
  'nginx',
  'adduser',
  'openssh-server',
];

export const DJANGO_PYTHON_PACKAGES = ['uWSGI==2.0.28', 'Django==4.2.16'];

export const UWSGI_SERVICE_PATH = '/lib/systemd/system/uwsgi.service';

export const djangoRecipe: Recipe = {
  role: 'django',
  summary: 'Django project served by uWSGI behind nginx',

  plan(prefix) {
    const userName = `${prefix}_user`;
    const userPassword = generatePassword();
    const userHome = `/home/${userName}`;
    const userDir = `${userHome}/`;

    const projectName = `${prefix}_project`;
    const projectPath = userDir + projectName;
    const projectDir = `${projectPath}/`;
    const settingsPath = `${projectDir}${projectName}/settings.py`;
    const nginxConfPath = `${projectDir}${projectName}_nginx.conf`;
    const uwsgiIniPath = `${projectDir}${projectName}_uwsgi.ini`;

    return {
      configuration: idmapConfiguration(),

      steps: context => [
        aptUpdate(),
        aptInstall('Installing debian packages', DJANGO_DEBIAN_PACKAGES),
        pipInstall(DJANGO_PYTHON_PACKAGES),
        addUser(userName, userFullName(prefix)),
        setPassword(userName, userPassword),
        run('Creating Django project', asUser(userName, `django-admin startproject ${projectName}`)),
        pipe(
          'Appending configuration to settings.py',
          emit(`\nSTATIC_ROOT = BASE_DIR / 'static'\nALLOWED_HOSTS = ['${context.address}', 'localhost']\n`),
          asUser(userName, `cat >> ${settingsPath}`)
        ),
        run('Updating static files configuration', asUser(userName, `cd ${projectName} && python3 manage.py collectstatic --noinput`)),
        run('Creating media directory', asUser(userName, `mkdir ${projectDir}media`)),
        writeFileStep(
          'Creating nginx configuration file',
          nginxConfPath,
          nginxSite(projectDir + projectName, context.address, projectDir),
          userName
        ),
        run('Copying nginx uwsgi parameter file', asUser(userName, `cp /etc/nginx/uwsgi_params ${projectDir}`)),
        run('Removing default site', ['rm', '-f', '/etc/nginx/sites-enabled/default']),
        run('Setting site status to active', ['ln', '-s', nginxConfPath, '/etc/nginx/sites-enabled/']),
        run('Restarting nginx', ['systemctl', 'restart', 'nginx']),
        writeFileStep('Creating uwsgi configuration file', uwsgiIniPath, uwsgiIni(projectName, userHome), userName),
        run('Creating uwsgi configuration directory', ['mkdir', '-p', '/etc/uwsgi/vassals']),
        run('Linking uwsgi configuration', ['ln', '-s', uwsgiIniPath, '/etc/uwsgi/vassals/']),
        writeFileStep('Creating uwsgi service', UWSGI_SERVICE_PATH, uwsgiService()),
        run('Activating uwsgi service', ['systemctl', 'enable', 'uwsgi']),
        run('Starting uwsgi service', ['systemctl', 'start', 'uwsgi']),
      ],

      result: context => ({
        container_name: context.name,
        container_address: context.address,
        user_name: userName,
        user_password: userPassword,
        project_path: projectPath,
      }),
    };
  },
};
