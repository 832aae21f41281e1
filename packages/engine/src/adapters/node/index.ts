export { NodeFileHandle, NodeFileSystem } from "./node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./node-socket.js";
