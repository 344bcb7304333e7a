import { and } from "../checks/and"
import { IdentifierCheck, IdentifierLaxCheck } from "../checks/identifier"
import { MaxBytes512 } from "../checks/max-bytes"
import { TitleCheck } from "../checks/title"
import { defineKind } from "./kind"

export const Title = defineKind({
  name: "Title",
  description: "title",
  check: and(MaxBytes512, TitleCheck),
})

export const Identifier = defineKind({
  name: "Identifier",
  description: "identifier",
  check: and(MaxBytes512, IdentifierCheck),
})

export const IdentifierLax = defineKind({
  name: "IdentifierLax",
  description: "identifier",
  check: and(MaxBytes512, IdentifierLaxCheck),
})

export type Title = typeof Title
export type Identifier = typeof Identifier
export type IdentifierLax = typeof IdentifierLax
