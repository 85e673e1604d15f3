import {
  CREATED_EVENT,
  DELETED_EVENT,
  EXTENDED_EVENT,
  UPDATED_EVENT,
} from "./constants";

export const EVENTS_ABI = [
  {
    anonymous: false,
    inputs: [
      { indexed: true, name: "entityKey", type: "uint256" },
      { indexed: false, name: "expirationBlock", type: "uint256" },
    ],
    name: CREATED_EVENT,
    type: "event",
  },
  {
    anonymous: false,
    inputs: [
      { indexed: true, name: "entityKey", type: "uint256" },
      { indexed: false, name: "expirationBlock", type: "uint256" },
    ],
    name: UPDATED_EVENT,
    type: "event",
  },
  {
    anonymous: false,
    inputs: [{ indexed: true, name: "entityKey", type: "uint256" }],
    name: DELETED_EVENT,
    type: "event",
  },
  {
    anonymous: false,
    inputs: [
      { indexed: true, name: "entityKey", type: "uint256" },
      { indexed: false, name: "oldExpirationBlock", type: "uint256" },
      { indexed: false, name: "newExpirationBlock", type: "uint256" },
    ],
    name: EXTENDED_EVENT,
    type: "event",
  },
] as const;

export type EventsAbi = typeof EVENTS_ABI;
