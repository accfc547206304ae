import * as k8s from '@kubernetes/client-node';
import chalk from 'chalk';

export interface KubeConnectionOptions {
  /** Explicit kubeconfig file; otherwise KUBECONFIG, ~/.kube/config, then in-cluster */
  kubeconfigPath?: string;
  context?: string;
}

export function loadKubeConfig(options: KubeConnectionOptions = {}): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();

  if (options.kubeconfigPath) {
    kc.loadFromFile(options.kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }

  if (options.context) {
    kc.setCurrentContext(options.context);
  }

  const currentContext = kc.getCurrentContext();
  console.log(`\n 🔧 Active cluster: ${chalk.cyan(currentContext)}`);

  return kc;
}
