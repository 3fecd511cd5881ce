export type {
  PushProgress,
  RemoteRef,
  RemoteTransport,
  TransportPushOptions
} from './interface'
export { SimpleGitTransport } from './SimpleGitTransport'
