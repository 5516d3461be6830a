import { describe, it, expect } from 'vitest';
import {
  FixedReleaseResolver,
  ProvisioningError,
  ProvisioningOrchestrator,
  type HostFile,
  type Recipe,
  type SandboxContext,
} from '@sandbox-provision/engine';
import {
  FakeSandboxProvider,
  createFakeSpawn,
  type FakeSandboxProviderOptions,
} from '@sandbox-provision/engine/testing';
import { RECIPES, RECIPE_NAMES, isRecipeName } from '../../src/recipes/index.js';
import { djangoRecipe } from '../../src/recipes/django.js';
import { postgresqlRecipe } from '../../src/recipes/postgresql.js';
import { ECLIPSE_URL, X11_MOUNT_ENTRY, pydevRecipe } from '../../src/recipes/pydev.js';
import { nginxSite, pydevLauncher, uwsgiService } from '../../src/templates/index.js';

function provisioner(providerOptions: FakeSandboxProviderOptions = {}) {
  const provider = new FakeSandboxProvider(providerOptions);
  const hostFiles: HostFile[] = [];
  const orchestrator = new ProvisioningOrchestrator({
    provider,
    settings: { fallbackRelease: 'bookworm', addressTimeoutSeconds: 5, distribution: 'debian', arch: 'amd64' },
    hostName: 'devbox',
    releaseResolver: new FixedReleaseResolver('bookworm'),
    spawnProc: createFakeSpawn().spawn,
    writeHostFile: async file => {
      hostFiles.push(file);
    },
  });
  return { provider, orchestrator, hostFiles };
}

function contextFor(recipe: Recipe): SandboxContext {
  const name = `acme_${recipe.role}_bookworm`;
  return {
    prefix: 'acme',
    name,
    release: 'bookworm',
    address: '10.0.3.17',
    hostName: 'devbox',
    sandboxPath: `/var/lib/lxc/${name}`,
  };
}

function descriptions(recipe: Recipe): string[] {
  return recipe.plan('acme').steps(contextFor(recipe)).map(step => step.description);
}

function input(provider: FakeSandboxProvider, argv0: string, last: string): string | undefined {
  return provider.attached.find(command => command.argv[0] === argv0 && command.argv[command.argv.length - 1] === last)
    ?.input;
}

const IDMAP_LINES = [
  'lxc.idmap = u 0 100000 1000',
  'lxc.idmap = g 0 100000 1000',
  'lxc.idmap = u 1000 1000 1',
  'lxc.idmap = g 1000 1000 1',
  'lxc.idmap = u 1001 101001 64535',
  'lxc.idmap = g 1001 101001 64535',
];

describe('Integration: recipes', () => {
  describe('registry', () => {
    it('should list every recipe under its role', () => {
      expect(RECIPE_NAMES).toEqual(['postgresql', 'django', 'pydev']);
      for (const name of RECIPE_NAMES) {
        expect(RECIPES[name].role).toBe(name);
      }
      expect(isRecipeName('django')).toBe(true);
      expect(isRecipeName('toString')).toBe(false);
    });
  });

  describe('postgresql', () => {
    it('should provision acme_postgresql_bookworm', async () => {
      const { provider, orchestrator } = provisioner();

      const result = await orchestrator.provision(postgresqlRecipe, 'acme');

      expect(Object.keys(result).sort()).toEqual([
        'container_address',
        'container_name',
        'database_name',
        'database_password',
        'database_user',
      ]);
      expect(result.container_name).toBe('acme_postgresql_bookworm');
      expect(result.container_address).toBe('10.0.3.17');
      expect(result.database_name).toBe('acme_db');
      expect(result.database_user).toBe('acme_user');
      expect(result.database_password).toMatch(/^[A-Za-z0-9]{8}$/);
      expect(provider.running('acme_postgresql_bookworm')).toBe(true);
      expect(provider.savedConfigs.size).toBe(0);
    });

    it('should run its steps in order', () => {
      expect(descriptions(postgresqlRecipe)).toEqual([
        'Updating apt',
        'Installing packages',
        'Configuring pg_hba.conf',
        'Configuring postgresql.conf',
        'Restarting PostgreSQL daemon',
        'Creating database user',
        'Creating database',
      ]);
    });

    it('should open the database to the sandbox subnet', () => {
      const steps = postgresqlRecipe.plan('acme').steps(contextFor(postgresqlRecipe));

      expect(steps[2].command).toEqual([
        'bash',
        '-c',
        "set -e; for conf in /etc/postgresql/*/main/pg_hba.conf; do printf '%s\\n' 'host\t\tacme_db\t\tacme_user\t\t10.0.3.0/24\t\tmd5' >> \"$conf\"; done",
      ]);
      expect(steps[3].command).toEqual([
        'bash',
        '-c',
        "set -e; for conf in /etc/postgresql/*/main/postgresql.conf; do grep -q '^#listen_addresses' \"$conf\"; " +
          "sed -i 's/^#listen_addresses.*/listen_addresses = '\\''acme_postgresql_bookworm,devbox'\\''/' \"$conf\"; done",
      ]);
    });

    it('should keep the password off the command line', async () => {
      const { provider, orchestrator } = provisioner();

      const result = await orchestrator.provision(postgresqlRecipe, 'acme');

      expect(input(provider, 'su', 'psql -v ON_ERROR_STOP=1')).toBe(
        `CREATE USER acme_user WITH PASSWORD '${result.database_password}';\n`
      );
      for (const command of provider.attached) {
        expect(command.argv.join(' ')).not.toContain(result.database_password);
      }
    });

    it('should destroy the sandbox when installing packages fails', async () => {
      const { provider, orchestrator } = provisioner({
        exitStatus: argv => (argv[0] === 'apt-get' && argv[1] === 'install' ? 100 : 0),
      });

      await expect(orchestrator.provision(postgresqlRecipe, 'acme')).rejects.toThrow(
        new ProvisioningError('step', 'Installing packages')
      );
      expect(provider.operations.slice(-2)).toEqual(['stop', 'destroy']);
      expect(provider.has('acme_postgresql_bookworm')).toBe(false);
    });
  });

  describe('django', () => {
    it('should provision a Django project', async () => {
      const { provider, orchestrator } = provisioner();

      const result = await orchestrator.provision(djangoRecipe, 'acme');

      expect(result).toEqual({
        container_name: 'acme_django_bookworm',
        container_address: '10.0.3.17',
        user_name: 'acme_user',
        user_password: result.user_password,
        project_path: '/home/acme_user/acme_project',
      });
      expect(result.user_password).toMatch(/^[A-Za-z0-9]{8}$/);
      expect(input(provider, 'chpasswd', 'chpasswd')).toBe(`acme_user:${result.user_password}\n`);
    });

    it('should map the container user before starting', async () => {
      const { provider, orchestrator } = provisioner();

      await orchestrator.provision(djangoRecipe, 'acme');

      expect(provider.savedConfigs.get('acme_django_bookworm')).toBe(
        ['lxc.uts.name = placeholder', ...IDMAP_LINES, ''].join('\n')
      );
    });

    it('should run its steps in order', () => {
      expect(descriptions(djangoRecipe)).toEqual([
        'Updating apt',
        'Installing debian packages',
        'Installing python packages',
        'Adding user',
        'Setting user password',
        'Creating Django project',
        'Appending configuration to settings.py',
        'Updating static files configuration',
        'Creating media directory',
        'Creating nginx configuration file',
        'Copying nginx uwsgi parameter file',
        'Removing default site',
        'Setting site status to active',
        'Restarting nginx',
        'Creating uwsgi configuration file',
        'Creating uwsgi configuration directory',
        'Linking uwsgi configuration',
        'Creating uwsgi service',
        'Activating uwsgi service',
        'Starting uwsgi service',
      ]);
    });

    it('should write the generated files into the sandbox', async () => {
      const { provider, orchestrator } = provisioner();

      await orchestrator.provision(djangoRecipe, 'acme');

      expect(input(provider, 'su', 'cat >> /home/acme_user/acme_project/acme_project/settings.py')).toBe(
        "\nSTATIC_ROOT = BASE_DIR / 'static'\nALLOWED_HOSTS = ['10.0.3.17', 'localhost']\n"
      );
      expect(input(provider, 'su', 'cat > /home/acme_user/acme_project/acme_project_nginx.conf')).toBe(
        nginxSite('/home/acme_user/acme_project/acme_project', '10.0.3.17', '/home/acme_user/acme_project/')
      );
      expect(input(provider, 'sh', 'cat > /lib/systemd/system/uwsgi.service')).toBe(uwsgiService());
    });
  });

  describe('pydev', () => {
    it('should provision Eclipse and leave the sandbox stopped', async () => {
      const { provider, orchestrator, hostFiles } = provisioner();

      const result = await orchestrator.provision(pydevRecipe, 'acme');

      expect(result).toEqual({
        container_name: 'acme_pydev_bookworm',
        container_address: '10.0.3.17',
        user_name: 'acme_user',
        user_password: result.user_password,
        startup_script: '/var/lib/lxc/acme_pydev_bookworm/start-pydev',
      });
      expect(hostFiles).toEqual([
        {
          path: '/var/lib/lxc/acme_pydev_bookworm/start-pydev',
          contents: pydevLauncher('acme_pydev_bookworm', 'acme_user', '/var/lib/lxc'),
          mode: 0o744,
        },
      ]);
      expect(provider.has('acme_pydev_bookworm')).toBe(true);
      expect(provider.running('acme_pydev_bookworm')).toBe(false);
    });

    it('should bind the X11 socket directory', async () => {
      const { provider, orchestrator } = provisioner();

      await orchestrator.provision(pydevRecipe, 'acme');

      expect(provider.savedConfigs.get('acme_pydev_bookworm')).toBe(
        ['lxc.uts.name = placeholder', `lxc.mount.entry = ${X11_MOUNT_ENTRY}`, ...IDMAP_LINES, ''].join('\n')
      );
    });

    it('should run its steps in order', () => {
      expect(descriptions(pydevRecipe)).toEqual([
        'Unmounting X11 directory',
        'Updating apt',
        'Installing debian packages',
        'Installing GUI packages',
        'Installing python packages',
        'Adding user',
        'Setting user password',
        'Appending container name to /etc/hosts',
        'Downloading and extracting Eclipse IDE',
        'Updating Eclipse configuration',
        'Installing PyDev',
      ]);
    });

    it('should stream the Eclipse download into tar', () => {
      const steps = pydevRecipe.plan('acme').steps(contextFor(pydevRecipe));
      const download = steps.find(step => step.description === 'Downloading and extracting Eclipse IDE');

      expect(download).toEqual({
        type: 'pipe',
        description: 'Downloading and extracting Eclipse IDE',
        hostCommand: ['curl', '-fsSL', ECLIPSE_URL],
        command: ['su', '-', 'acme_user', '-c', 'tar xz'],
      });
    });

    it('should only run on LXC', async () => {
      const { provider, orchestrator } = provisioner({ backend: 'docker' });

      await expect(orchestrator.provision(pydevRecipe, 'acme')).rejects.toThrow(
        'Recipe pydev does not support the docker backend'
      );
      expect(provider.operations).toEqual([]);
    });
  });
});
