import { canDelete, canViewDataset, canViewSample, isPrivileged } from "../src/policy/accessPolicy";
import { UserRole, Visibility } from "../src/types/domain";

describe("Access Policy Suite", () => {
  const researcher = { id: 7, role: UserRole.Researcher };
  const otherResearcher = { id: 8, role: UserRole.Researcher };
  const dataAdmin = { id: 2, role: UserRole.DataAdmin };
  const admin = { id: 1, role: UserRole.Admin };

  const privateDataset = { visibility: Visibility.Private, createdBy: 7 };
  const groupDataset = { visibility: Visibility.Group, createdBy: 7 };

  describe("isPrivileged", () => {
    it("should admit admin and data_admin only", () => {
      expect(isPrivileged(UserRole.Admin)).toBe(true);
      expect(isPrivileged(UserRole.DataAdmin)).toBe(true);
      expect(isPrivileged(UserRole.Researcher)).toBe(false);
    });
  });

  describe("canViewDataset", () => {
    it("should let anyone see a group dataset", () => {
      expect(canViewDataset(otherResearcher, groupDataset)).toBe(true);
    });

    it("should hide a private dataset from other researchers", () => {
      expect(canViewDataset(otherResearcher, privateDataset)).toBe(false);
    });

    it("should show a private dataset to its creator and to privileged roles", () => {
      expect(canViewDataset(researcher, privateDataset)).toBe(true);
      expect(canViewDataset(dataAdmin, privateDataset)).toBe(true);
      expect(canViewDataset(admin, privateDataset)).toBe(true);
    });
  });

  describe("canViewSample", () => {
    it("should let the uploader see a sample inside someone else's private dataset", () => {
      expect(canViewSample(otherResearcher, { createdBy: 8 }, privateDataset)).toBe(true);
    });

    it("should hide a sample of a private dataset from unrelated researchers", () => {
      expect(canViewSample(otherResearcher, { createdBy: 7 }, privateDataset)).toBe(false);
    });

    it("should follow the parent's group visibility", () => {
      expect(canViewSample(otherResearcher, { createdBy: 7 }, groupDataset)).toBe(true);
    });
  });

  describe("canDelete", () => {
    it("should allow the creator and privileged roles", () => {
      expect(canDelete(researcher, { createdBy: 7 })).toBe(true);
      expect(canDelete(dataAdmin, { createdBy: 7 })).toBe(true);
    });

    it("should refuse other researchers even on group resources", () => {
      expect(canDelete(otherResearcher, { createdBy: 7 })).toBe(false);
    });
  });
});
