import type { Packer, Unpacker } from "../../../lib/msgpack.js";
import { enumType, objectType } from "../../../reflection/describe.js";
import { Types } from "../../../reflection/types.js";

export const Color = enumType("Color", { Red: 0, Green: 1, Blue: 2 });

export const Person = objectType({
  name: "Person",
  fields: { Name: Types.string, Age: Types.int32 },
});

export const Address = objectType({
  name: "Address",
  fields: { City: Types.string, Zip: Types.nullable(Types.int32) },
});

export const Envelope = objectType({
  name: "Envelope",
  fields: { Payload: Types.any },
});

export const Profile = objectType({
  name: "Profile",
  fields: {
    Owner: Person,
    Favorite: Color,
    Tags: Types.array(Types.string),
    Scores: Types.map(Types.string, Types.int32),
    Nickname: Types.nullable(Types.string),
    Home: Types.nullable(Address),
    Pair: Types.tuple(Types.string, Types.int32),
  },
});

export class PointValue {
  constructor(
    public x = 0,
    public y = 0
  ) {}

  packToMessage(packer: Packer): void {
    packer.packArrayHeader(2);
    packer.packInteger(this.x);
    packer.packInteger(this.y);
  }

  unpackFromMessage(unpacker: Unpacker): void {
    unpacker.readArrayHeader();
    this.x = unpacker.readInteger();
    this.y = unpacker.readInteger();
  }
}

export const Point = objectType({
  name: "Point",
  packable: true,
  unpackable: true,
  create: () => new PointValue(),
});
