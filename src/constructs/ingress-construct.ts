import * as kplus from 'cdk8s-plus-33';
import { Construct } from 'constructs';
import { validateDomainFormat } from '../utils/validators';

export interface IngressConstructProps {
  readonly namespace: kplus.Namespace;

  /**
   * Public hostname (FQDN)
   * @example "blog.example.com"
   */
  readonly hostname: string;

  /**
   * Service receiving all traffic (the Nginx proxy)
   */
  readonly backendService: kplus.Service;

  readonly backendPort: number;

  /**
   * @default "nginx"
   */
  readonly className?: string;

  /**
   * cert-manager ClusterIssuer; TLS is only configured when set
   */
  readonly certIssuer?: string;

  /**
   * @default "wordpress-tls"
   */
  readonly tlsSecretName?: string;
}

/**
 * Ingress Construct - external HTTP(S) entry point for the proxy tier
 */
export class IngressConstruct extends Construct {
  public readonly ingress: kplus.Ingress;

  constructor(scope: Construct, id: string, props: IngressConstructProps) {
    super(scope, id);

    validateDomainFormat(props.hostname, 'ingress.hostname');

    const annotations: Record<string, string> = {};
    if (props.certIssuer) {
      annotations['cert-manager.io/cluster-issuer'] = props.certIssuer;
    }

    this.ingress = new kplus.Ingress(this, 'ingress', {
      metadata: {
        namespace: props.namespace.name,
        labels: {
          'app.kubernetes.io/name': 'wordpress-ingress',
          'app.kubernetes.io/component': 'ingress',
          'app.kubernetes.io/part-of': 'wordpress',
        },
        annotations,
      },
      className: props.className ?? 'nginx',
      rules: [
        {
          host: props.hostname,
          path: '/',
          pathType: kplus.HttpIngressPathType.PREFIX,
          backend: kplus.IngressBackend.fromService(props.backendService, { port: props.backendPort }),
        },
      ],
      tls: props.certIssuer
        ? [
          {
            hosts: [props.hostname],
            secret: kplus.Secret.fromSecretName(this, 'tls-secret', props.tlsSecretName ?? 'wordpress-tls'),
          },
        ]
        : undefined,
    });
  }
}
