// Owner of the holdings. Only attached to the report header.
export interface Investor {
  investorId: string;
  name: string;
  address: string;
  phone: string;
}
