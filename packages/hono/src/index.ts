export { createHonoHttpContext } from "./HonoAdapter";
