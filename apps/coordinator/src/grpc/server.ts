import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import path from 'path';
import { Coordinator } from '../coordinator';
import { CoordinatorServiceImpl } from './coordinator.service';
import { HealthService } from './health.service';

const PROTO_DIR = path.dirname(require.resolve('@leadforge/proto/package.json'));

const protoOptions = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

const healthPackageDef = protoLoader.loadSync(path.join(PROTO_DIR, 'health.service.proto'), protoOptions);
const coordinatorPackageDef = protoLoader.loadSync(path.join(PROTO_DIR, 'coordinator.service.proto'), protoOptions);

type ProtoNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

/** Resolves a dotted service name like `grpc.health.v1.Health` in a loaded package. */
export function serviceDefinition(def: protoLoader.PackageDefinition, name: string): grpc.ServiceDefinition {
  let node: ProtoNode = grpc.loadPackageDefinition(def);
  for (const part of name.split('.')) {
    if (typeof node === 'function' || 'format' in node) {
      throw new Error(`${name}: ${part} is not a namespace`);
    }
    const child: ProtoNode | undefined = node[part];
    if (!child) throw new Error(`${name}: ${part} not found`);
    node = child;
  }
  if (typeof node !== 'function') {
    throw new Error(`${name} is not a service`);
  }
  return node.service;
}

export interface GrpcServerOptions {
  apiToken?: string;
}

export function createGrpcServer(coordinator: Coordinator, opts: GrpcServerOptions = {}): grpc.Server {
  const server = new grpc.Server({
    'grpc.max_receive_message_length': 4 * 1024 * 1024,
    'grpc.max_send_message_length': 4 * 1024 * 1024,
    'grpc.keepalive_time_ms': 30000,
    'grpc.keepalive_timeout_ms': 10000,
    'grpc.keepalive_permit_without_calls': 1,
  });

  const health = new HealthService(coordinator.store);
  server.addService(serviceDefinition(healthPackageDef, 'grpc.health.v1.Health'), {
    check: health.check.bind(health),
    watch: health.watch.bind(health),
  });

  const service = new CoordinatorServiceImpl(coordinator, opts.apiToken);
  server.addService(serviceDefinition(coordinatorPackageDef, 'leadforge.Coordinator'), {
    createWorkspace: service.createWorkspace.bind(service),
    getWorkspace: service.getWorkspace.bind(service),
    listWorkspaces: service.listWorkspaces.bind(service),
    replaceWorkspace: service.replaceWorkspace.bind(service),
    deleteWorkspace: service.deleteWorkspace.bind(service),
    enqueueJob: service.enqueueJob.bind(service),
    getJobStatus: service.getJobStatus.bind(service),
    streamJobStatus: service.streamJobStatus.bind(service),
    listLeads: service.listLeads.bind(service),
  });

  return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
      if (err) {
        reject(err);
      } else {
        console.log(`[coordinator] grpc server listening on port ${boundPort}`);
        resolve(boundPort);
      }
    });
  });
}
