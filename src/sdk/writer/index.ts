export {
    createEntity,
    updateEntity,
    deleteEntity,
    extendEntity,
    executeOperations,
} from "./write";
export {sendOperations, type WriterContext} from "./writer_utils";
