export {readEntity, readEntities, entityExists} from "./reading_flow";
export {buildQuery} from "./query";
