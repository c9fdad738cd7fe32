export {
  createExpressHttpContext,
  type SessionJarExpressRequest,
  type SessionJarExpressResponse,
} from "./ExpressAdapter";
