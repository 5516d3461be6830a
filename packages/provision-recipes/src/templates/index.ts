/**
 * Configuration file templates written into (or next to) sandboxes
 */

/**
 * nginx site proxying to a uWSGI unix socket
 * @param socketBase Socket path without the `.sock` suffix
 * @param serverName Address or FQDN the site answers for
 * @param projectDir Project directory, with trailing slash
 */
export function nginxSite(socketBase: string, serverName: string, projectDir: string): string {
  return `
# the upstream component nginx needs to connect to
upstream django {
    server unix://${socketBase}.sock; # for a file socket
}

# configuration of the server
server {
    # the port your site will be served on
    listen      80;
    # the domain name it will serve for
    server_name ${serverName};
    charset     utf-8;

    # max upload size
    client_max_body_size 75M;

    location = /favicon.ico { access_log off; log_not_found off; }

    # Django media
    location /media  {
        alias ${projectDir}media;
    }

    location /static {
        alias ${projectDir}static;
    }

    # Finally, send all non-media requests to the Django server.
    location / {
        uwsgi_pass  django;
        include     ${projectDir}uwsgi_params;
    }
}
`;
}

/**
 * uWSGI vassal for a Django project living in `<base>/<project>`
 */
export function uwsgiIni(project: string, base: string): string {
  return `
[uwsgi]
project         = ${project}
base            = ${base}

chdir           = %(base)/%(project)
module          = %(project).wsgi

master          = true
processes       = 5
socket          = %(base)/%(project)/%(project).sock
chmod-socket    = 666
vacuum          = true
daemonize       = /var/log/uwsgi-emperor.log
`;
}

/**
 * systemd unit running the uWSGI emperor over /etc/uwsgi/vassals
 */
export function uwsgiService(uwsgiBinary = '/usr/local/bin/uwsgi'): string {
  return `
[Unit]
Description=uWSGI Emperor
After=syslog.target

[Service]
ExecStart=${uwsgiBinary} --emperor /etc/uwsgi/vassals
Restart=always
KillSignal=SIGQUIT
Type=notify
StandardError=syslog
NotifyAccess=all

[Install]
WantedBy=multi-user.target
`;
}

/**
 * Host-side launcher: starts the container if needed, runs Eclipse as
 * `user` with the host's X display, and stops the container again if it
 * started it.
 */
export function pydevLauncher(container: string, user: string, lxcPath: string): string {
  return `#!/bin/sh
CONTAINER=${container}
LXC_PATH="${lxcPath}"
CMD_LINE="eclipse/eclipse $*"

STARTED=false

if ! lxc-wait -P "$LXC_PATH" -n $CONTAINER -s RUNNING -t 0; then
    lxc-start -P "$LXC_PATH" -n $CONTAINER -d
    lxc-wait -P "$LXC_PATH" -n $CONTAINER -s RUNNING
    STARTED=true
fi

lxc-attach -P "$LXC_PATH" --clear-env -n $CONTAINER -- sudo -u ${user} -i env DISPLAY=$DISPLAY $CMD_LINE

if [ "$STARTED" = "true" ]; then
    lxc-stop -P "$LXC_PATH" -n $CONTAINER -t 10
fi
`;
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
