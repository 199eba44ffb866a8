/** Raw answers as typed by the operator or taken from env/config. */
export interface RawInputs {
  gitUrl: string;
  token: string;
  branch: string;
  sshUser: string;
  sshHost: string;
  sshKey: string;
  appPort: string;
  remoteBase: string;
}

export interface DeployInputs {
  gitUrl: string;
  token: string;
  branch: string;
  sshUser: string;
  sshHost: string;
  sshKeyPath: string;
  appPort: number;
  remoteBase: string;
  projectName: string;
  remoteProjectDir: string;
}
